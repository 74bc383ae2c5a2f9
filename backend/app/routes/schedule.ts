import express, { NextFunction, Request, Response } from 'express';
import type { ScheduleService } from '../services/scheduler.js';
import type { ScheduleCache } from '../schedule/cache.js';

export default function scheduleRouter(
    scheduler: Pick<ScheduleService, 'refreshNow'>,
    cache: Pick<ScheduleCache, 'snapshot'>,
) {
    const router = express.Router();

    router.post('/regenerate', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const summary = await scheduler.refreshNow();
            res.json({
                success: true,
                message: `M3U/XMLTV refreshed: ${summary.surfaces} surfaces, ${summary.events} events`,
                surfaces: summary.surfaces,
                events: summary.events,
                sources: summary.stats,
                lastRefreshed: summary.lastRefreshed.toISOString(),
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * Event counts per surface in the current snapshot.
     */
    router.get('/schedule', (_req: Request, res: Response) => {
        const snapshot = cache.snapshot();
        const surfaces = [...snapshot.grouped].map(([surfaceId, events]) => ({ surfaceId, events: events.length }));
        res.json({
            lastRefreshed: snapshot.lastRefreshed ? snapshot.lastRefreshed.toISOString() : null,
            windowStart: snapshot.windowStart.toISOString(),
            windowEnd: snapshot.windowEnd.toISOString(),
            surfaces,
        });
    });

    return router;
}
