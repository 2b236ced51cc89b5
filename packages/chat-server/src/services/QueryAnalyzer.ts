import type { MetadataFilters } from '@medrecall/shared';
import type { Degradable, EntitySet, Intent, QueryAnalysis } from '../types/ChatTypes.js';
import { countEntities, emptyEntities } from '../types/ChatTypes.js';
import type { ConditionEntry, MedicalLexicon } from './MedicalLexicon.js';
import { dedupe, normalizeText } from '../utils/text.js';

type PatternGroup = readonly [Intent, readonly RegExp[]];

// Evaluated top-down against the normalized query; the first group with a hit wins.
// Patterns are only tested for a match, never captured.
const INTENT_PATTERNS: readonly PatternGroup[] = [
    ['patient_info', [
        /qu[eé].*(enfermedad|tiene|diagn[oó]stico).*[\w\s]/i,
        /informaci[oó]n.*(paciente|de).*[\w\s]/i,
        /qu[eé].*(le pasa|padece).*[\w\s]/i,
        /[\w\s].*qu[eé].*(tiene|enfermedad|diagn[oó]stico)/i
    ]],
    ['condition_list', [
        /lista.*pacientes.*(con|que tienen).*[\w\s]/i,
        /qui[eé]nes.*(tienen|padecen).*[\w\s]/i,
        /pacientes.*[\w\s]/i,
        /cu[aá]ntos.*pacientes.*[\w\s]/i
    ]],
    ['symptom_search', [
        /qui[eé]n.*tiene.*(dolor|s[ií]ntoma|molestia).*[\w\s]/i,
        /pacientes.*con.*(dolor|s[ií]ntoma|molestia).*[\w\s]/i,
        /[\w\s].*pacientes/i
    ]],
    ['medication_info', [
        /qu[eé].*(medicamento|medicina|tratamiento).*toma.*[\w\s]/i,
        /medicamentos.*para.*[\w\s]/i,
        /tratamiento.*de.*[\w\s]/i
    ]],
    ['temporal_query', [
        /[\w\s].*paciente/i,
        /[uú]ltima.*consulta.*[\w\s]/i,
        /cu[aá]ndo.*fue.*[\w\s]/i
    ]]
];
const TITLE_CASE_SEQUENCE = /\p{Lu}\p{Ll}+(?:\s+\p{Lu}\p{Ll}+)*/gu;
const CUE_WORD_SEQUENCE = /(?<!\p{L})(?:[Pp]aciente|de|tiene)\s+(\p{Lu}\p{Ll}+(?:\s+\p{Lu}\p{Ll}+)*)/gu;

const DATE_PATTERNS: readonly RegExp[] = [
    /\b(ayer|hoy|manana)\b/g,
    /\b(semana|mes|ano)\s+(pasad[ao]|anterior|ultim[ao])\b/g,
    /\b\d{1,2}\/\d{1,2}\/\d{4}\b/g,
    /\b\d{4}-\d{2}-\d{2}\b/g
];

const MIN_PATIENT_NAME_LENGTH = 3;
const MIN_SEARCH_TERM_LENGTH = 3;
const MAX_SEARCH_TERMS = 10;
const SYNONYMS_PER_CONDITION = 3;

export class QueryAnalyzer {
    private lexicon: MedicalLexicon;

    constructor(lexicon: MedicalLexicon) {
        this.lexicon = lexicon;
    }

    analyze(query: string): QueryAnalysis {
        const result = this.tryAnalyze(query);
        if (!result.ok) {
            console.warn('[QueryAnalyzer] Analysis degraded, using minimal analysis:', result.error);
        }
        return result.value;
    }

    tryAnalyze(query: string): Degradable<QueryAnalysis> {
        try {
            const normalizedQuery = normalizeText(query);
            const intent = this.classifyIntent(normalizedQuery);
            const entities = this.extractEntities(query, normalizedQuery);
            const searchTerms = this.generateSearchTerms(query, normalizedQuery, entities);
            const autoFilters = this.generateFilters(intent, entities);

            const analysis: QueryAnalysis = {
                originalQuery: query,
                normalizedQuery,
                intent,
                entities,
                searchTerms: Object.freeze(searchTerms),
                autoFilters: Object.freeze(autoFilters)
            };

            console.log('[QueryAnalyzer] Query analyzed:', {
                intent,
                entityCount: countEntities(entities),
                searchTermCount: searchTerms.length
            });

            return { ok: true, value: Object.freeze(analysis) };
        } catch (error) {
            return { ok: false, value: degradedAnalysis(query), error };
        }
    }

    classifyIntent(normalizedQuery: string): Intent {
        for (const [intent, patterns] of INTENT_PATTERNS) {
            if (patterns.some(pattern => pattern.test(normalizedQuery))) {
                return intent;
            }
        }
        return 'general_query';
    }

    extractEntities(query: string, normalizedQuery: string = normalizeText(query)): EntitySet {
        return Object.freeze({
            patients: Object.freeze(this.extractPatients(query)),
            conditions: Object.freeze(this.matchConditions(normalizedQuery).map(entry => entry.name)),
            symptoms: Object.freeze(this.matchKeywords(this.lexicon.symptoms, normalizedQuery)),
            medications: Object.freeze(this.matchKeywords(this.lexicon.medications, normalizedQuery)),
            dates: Object.freeze(this.extractDates(normalizedQuery))
        });
    }

    private extractPatients(query: string): string[] {
        const candidates: string[] = [];

        for (const match of query.matchAll(TITLE_CASE_SEQUENCE)) {
            candidates.push(match[0]);
        }
        for (const match of query.matchAll(CUE_WORD_SEQUENCE)) {
            candidates.push(match[1]);
        }

        const names = candidates
            .map(candidate => this.dropLeadingStopwords(candidate))
            .filter(name => name.length >= MIN_PATIENT_NAME_LENGTH);

        return dedupe(names);
    }

    // Sentence openers ("Qué", "Listame") are dropped; a run that starts with a
    // medical term ("Fiebre Alta") is not a name at all.
    private dropLeadingStopwords(sequence: string): string {
        const words = sequence.split(/\s+/);
        let start = 0;
        while (start < words.length && this.lexicon.isNameStopword(words[start])) {
            if (this.lexicon.isMedicalTerm(words[start])) return '';
            start++;
        }
        return words.slice(start).join(' ');
    }

    private matchConditions(normalizedQuery: string): readonly ConditionEntry[] {
        return this.lexicon.conditions.filter(
            entry => entry.synonyms.some(synonym => normalizedQuery.includes(normalizeText(synonym)))
        );
    }

    private matchKeywords(keywords: readonly string[], normalizedQuery: string): string[] {
        return dedupe(keywords.filter(keyword => normalizedQuery.includes(normalizeText(keyword))));
    }

    private extractDates(normalizedQuery: string): string[] {
        const dates: string[] = [];
        for (const pattern of DATE_PATTERNS) {
            for (const match of normalizedQuery.matchAll(pattern)) {
                dates.push(match[0]);
            }
        }
        return dedupe(dates);
    }

    private generateSearchTerms(query: string, normalizedQuery: string, entities: EntitySet): string[] {
        const synonyms = this.matchConditions(normalizedQuery)
            .flatMap(entry => entry.synonyms.slice(0, SYNONYMS_PER_CONDITION));

        const terms = [
            query.trim(),
            ...entities.patients,
            ...entities.conditions,
            ...entities.symptoms,
            ...entities.medications,
            ...entities.dates,
            ...synonyms
        ].filter(term => term.length >= MIN_SEARCH_TERM_LENGTH);

        return dedupe(terms).slice(0, MAX_SEARCH_TERMS);
    }

    private generateFilters(intent: Intent, entities: EntitySet): MetadataFilters {
        const filters: MetadataFilters = {};

        if (intent === 'patient_info' && entities.patients.length === 1) {
            filters.patient_name = { $eq: entities.patients[0] };
        }

        if (intent === 'condition_list' && entities.conditions.length > 0) {
            filters.diagnosis = { $contains: entities.conditions[0] };
        }

        return filters;
    }
}

export function degradedAnalysis(query: string): QueryAnalysis {
    const analysis: QueryAnalysis = {
        originalQuery: query,
        normalizedQuery: query.toLowerCase(),
        intent: 'general_query',
        entities: emptyEntities(),
        searchTerms: [query],
        autoFilters: {}
    };
    return Object.freeze(analysis);
}
