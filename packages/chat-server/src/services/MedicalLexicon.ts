import { readFileSync } from 'fs';
import { z } from 'zod';
import { normalizeText } from '../utils/text.js';

const lexiconSchema = z.object({
    conditions: z.record(z.array(z.string().min(1)).min(1)),
    symptoms: z.array(z.string().min(1)),
    medications: z.array(z.string().min(1)),
    nameStopwords: z.array(z.string().min(1))
});

type LexiconData = z.infer<typeof lexiconSchema>;

export interface ConditionEntry {
    readonly name: string;
    readonly synonyms: readonly string[];
}

export const DEFAULT_LEXICON_URL = new URL('../data/medical-lexicon.json', import.meta.url);

/**
 * Read-only medical vocabulary used by the query analyzer: condition synonyms,
 * symptom and medication keywords, and the words that never start a patient
 * name (sentence openers plus every medical term above). Built once at startup
 * and injected.
 */
export class MedicalLexicon {
    readonly conditions: readonly ConditionEntry[];
    readonly symptoms: readonly string[];
    readonly medications: readonly string[];
    private readonly nameStopwords: ReadonlySet<string>;
    private readonly medicalTerms: ReadonlySet<string>;

    private constructor(data: LexiconData) {
        this.conditions = Object.freeze(
            Object.entries(data.conditions).map(([name, synonyms]) => Object.freeze({
                name,
                synonyms: Object.freeze([...synonyms])
            }))
        );
        this.symptoms = Object.freeze([...data.symptoms]);
        this.medications = Object.freeze([...data.medications]);
        this.medicalTerms = new Set([
            ...Object.values(data.conditions).flat(),
            ...data.symptoms,
            ...data.medications
        ].map(word => normalizeText(word)));
        this.nameStopwords = new Set([
            ...data.nameStopwords.map(word => normalizeText(word)),
            ...this.medicalTerms
        ]);
    }

    static fromData(raw: unknown): MedicalLexicon {
        return new MedicalLexicon(lexiconSchema.parse(raw));
    }

    static load(location: URL = DEFAULT_LEXICON_URL): MedicalLexicon {
        const raw: unknown = JSON.parse(readFileSync(location, 'utf-8'));
        const lexicon = MedicalLexicon.fromData(raw);
        console.log('[MedicalLexicon] Loaded', lexicon.conditions.length, 'conditions,', lexicon.symptoms.length, 'symptoms');
        return lexicon;
    }

    isNameStopword(word: string): boolean {
        return this.nameStopwords.has(normalizeText(word));
    }

    isMedicalTerm(word: string): boolean {
        return this.medicalTerms.has(normalizeText(word));
    }
}
