import { Router, Request, Response } from 'express';

export function StatusRouter(): Router {
    const router = Router();

    router.get("/health", async (req: Request, res: Response) => {
        res.status(200).json({
            status: 'healthy',
            service: 'medrecall-chat-server',
            capabilities: [
                'patient_info_queries',
                'condition_list_queries',
                'symptom_search',
                'medication_info',
                'temporal_queries'
            ],
            timestamp: new Date().toISOString()
        });
    });

    return router;
}
