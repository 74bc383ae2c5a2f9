import express, { NextFunction, Request, Response } from 'express';
import { logger, type Logger } from './services/logger.js';
import { NotFoundError, ValidationError, errorMessage } from './services/errors.js';
import type { CatalogService } from './services/catalog.js';
import type { CatalogSync } from './services/catalog-sync.js';
import type { GuideService } from './services/guide.js';
import type { ScheduleService } from './services/scheduler.js';
import type { StreamService } from './services/stream.js';
import type { ScheduleCache } from './schedule/cache.js';
import guideRouter from './routes/guide.js';
import streamRouter from './routes/stream.js';
import catalogRouter from './routes/catalog.js';
import scheduleRouter from './routes/schedule.js';
import logsRouter from './routes/logs.js';

export interface AppDeps {
	catalog: Pick<CatalogService, 'listVenues' | 'listSurfaces' | 'listFavorites' | 'toggleFavorite'>;
	catalogSync: Pick<CatalogSync, 'sync'>;
	guide: Pick<GuideService, 'playlist' | 'xmltv'>;
	streams: Pick<StreamService, 'resolve' | 'relay'>;
	scheduler: Pick<ScheduleService, 'refreshNow'>;
	cache: Pick<ScheduleCache, 'snapshot'>;
	log?: Pick<Logger, 'recent' | 'info' | 'error'>;
}

// polled by the UI; would drown everything else in the log buffer
const QUIET_PATHS = ['/api/logs', '/api/favorites'];

const statusFor = (error: unknown): number => {
	if (error instanceof NotFoundError) return 404;
	if (error instanceof ValidationError) return 400;
	return 500;
};

export function createApp(deps: AppDeps) {
	const log = deps.log ?? logger;
	const app = express();

	app.use(express.json());

	app.use((req: Request, _res: Response, next: NextFunction) => {
		if (!QUIET_PATHS.includes(req.path))
			log.info(`${req.method} ${req.originalUrl}`);
		next();
	});

	app.get('/health', (_req: Request, res: Response) => {
		res.json({ status: 'ok' });
	});

	app.use(guideRouter(deps.guide));
	app.use(streamRouter(deps.streams));
	app.use('/api', catalogRouter(deps.catalog, deps.catalogSync));
	app.use('/api', scheduleRouter(deps.scheduler, deps.cache));
	app.use('/api', logsRouter(log));

	app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
		const status = statusFor(error);
		if (status === 500)
			log.error(`${req.method} ${req.originalUrl} failed`, error);
		if (res.headersSent) {
			res.end();
			return;
		}
		res.status(status).json({ success: false, message: errorMessage(error) });
	});

	return app;
}
