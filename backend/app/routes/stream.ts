import express, { NextFunction, Request, Response } from 'express';
import type { StreamService } from '../services/stream.js';
import { parseId } from './params.js';

export default function streamRouter(streams: Pick<StreamService, 'resolve' | 'relay'>) {
	const router = express.Router();

	router.get('/proxy/:surfaceId', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const surfaceId = parseId(req.params.surfaceId, 'surface id');
			const resolved = await streams.resolve(surfaceId);
			if (!resolved.ok) {
				res.status(resolved.status).type('text/plain').send(resolved.message);
				return;
			}
			await streams.relay(surfaceId, resolved.url, res);
		} catch (error) {
			next(error);
		}
	});

	return router;
}
