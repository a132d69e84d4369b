import { Router, type Request, type Response } from 'express';

export function StatusRouter(): Router {
    const router = Router();

    router.get('/health', async (req: Request, res: Response) => {
        res.status(200).json({
            status: 'healthy',
            service: 'feedline-server',
            timestamp: new Date().toISOString()
        });
    });

    return router;
}
