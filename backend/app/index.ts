import http from 'http';
import { loadConfig } from './config/index.js';
import { logger } from './services/logger.js';
import { errorMessage } from './services/errors.js';
import { fetchText } from './services/http.js';
import { CatalogService } from './services/catalog.js';
import { CatalogSync } from './services/catalog-sync.js';
import { GuideService } from './services/guide.js';
import { ScheduleService } from './services/scheduler.js';
import { StreamCapture, StreamService } from './services/stream.js';
import { publicBaseUrl } from './services/detect.js';
import { createSources } from './schedule/providers/index.js';
import { SourceRegistry } from './schedule/registry.js';
import { ScheduleCache } from './schedule/cache.js';
import { createApp } from './app.js';

const config = await loadConfig();
logger.setLevel(config.logLevel);

const catalog = new CatalogService(config.paths.catalog);
catalog.init();

const catalogSync = new CatalogSync(catalog, config.catalog.url, config.catalog.timeoutMs);
if (catalog.venueCount === 0) {
	try {
		const result = await catalogSync.sync();
		logger.info(`Venue catalog synced: ${result.venues} venues, ${result.surfaces} surfaces`);
	} catch (error) {
		logger.error(`Initial venue catalog sync failed: ${errorMessage(error)}`);
	}
}

const registry = new SourceRegistry(createSources(config, fetchText));
const cache = new ScheduleCache(registry);
const scheduler = new ScheduleService(cache, config.schedule.cron, config.schedule.timeZone);

const baseUrl = publicBaseUrl(config.publicHost, config.publicPort);
const guide = new GuideService(catalog, cache, {
	baseUrl,
	generatorName: config.guide.generatorName,
	groupTitle: config.guide.groupTitle,
	placeholderSeconds: config.guide.placeholderSeconds,
	timeZone: config.guide.timeZone,
});

const capture = new StreamCapture(config.stream.captureCommand, config.stream.captureTimeoutMs);
if (!capture.configured)
	logger.warn('No capture command configured; only stored stream URLs can be played');
const streams = new StreamService(catalog, capture, config.stream);

const app = createApp({ catalog, catalogSync, guide, streams, scheduler, cache });
const server = http.createServer(app);

await scheduler.start();

server.listen(config.port, config.address, () => {
	logger.info(`Server running on http://${config.address}:${config.port}`);
	logger.info(`Playlist: ${baseUrl}/playlist.m3u`);
	logger.info(`Guide: ${baseUrl}/xmltv`);
	logger.info(`Sources: \n${registry.sources.map(source => `\t${source.name()}${source.isEnabled() ? '' : ' (disabled)'}`).join('\n')}`);
});

const shutdown = (signal: string) => {
	logger.info(`${signal} received, shutting down`);
	scheduler.stop();
	server.close(() => process.exit(0));
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

export default app;
