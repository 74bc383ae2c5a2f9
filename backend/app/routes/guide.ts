import express, { Request, Response } from 'express';
import type { GuideService } from '../services/guide.js';

/**
 * Playlist and guide for the favorite surfaces, rendered from the cached
 * schedule on every request.
 */
export default function guideRouter(guide: Pick<GuideService, 'playlist' | 'xmltv'>) {
    const router = express.Router();

    router.get('/playlist.m3u', (_req: Request, res: Response) => {
        res.type('application/x-mpegURL').send(guide.playlist());
    });

    router.get('/xmltv', (_req: Request, res: Response) => {
        res.type('application/xml').send(guide.xmltv());
    });

    return router;
}
