import express, { Request, Response } from 'express';
import type { Logger } from '../services/logger.js';

export default function logsRouter(log: Pick<Logger, 'recent'>) {
    const router = express.Router();

    router.get('/logs', (_req: Request, res: Response) => {
        res.json({ lines: log.recent() });
    });

    return router;
}
