import express, { NextFunction, Request, Response } from 'express';
import type { CatalogService } from '../services/catalog.js';
import type { CatalogSync } from '../services/catalog-sync.js';
import { parseCount, parseId } from './params.js';

type Catalog = Pick<CatalogService, 'listVenues' | 'listSurfaces' | 'listFavorites' | 'toggleFavorite'>;

export default function catalogRouter(catalog: Catalog, sync: Pick<CatalogSync, 'sync'>) {
    const router = express.Router();

    /**
     * Venue search, alphabetical. `search` matches name or city.
     */
    router.get('/venues', (req: Request, res: Response) => {
        const search = typeof req.query.search === 'string' ? req.query.search : undefined;
        const state = typeof req.query.state === 'string' && req.query.state ? req.query.state : undefined;
        const venues = catalog.listVenues({
            search,
            state,
            limit: parseCount(req.query.limit, 'limit'),
            offset: parseCount(req.query.offset, 'offset'),
        });
        res.json({ venues });
    });

    router.get('/venues/:venueId/surfaces', (req: Request, res: Response) => {
        const venueId = parseId(req.params.venueId, 'venue id');
        res.json({ surfaces: catalog.listSurfaces(venueId) });
    });

    router.get('/favorites', (_req: Request, res: Response) => {
        res.json({ favorites: catalog.listFavorites() });
    });

    router.post('/favorites/:surfaceId/toggle', (req: Request, res: Response) => {
        const surfaceId = parseId(req.params.surfaceId, 'surface id');
        const status = catalog.toggleFavorite(surfaceId);
        res.json({ success: true, status, surfaceId });
    });

    router.post('/catalog/sync', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await sync.sync();
            res.json({ success: true, ...result });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
