import cron from 'node-cron';
import { Mutex } from 'async-mutex';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import type { RefreshSummary, ScheduleCache } from '../schedule/cache.js';

interface CronTask {
    stop(): void;
}

export type CronScheduler = (expression: string, task: () => void, options: { timezone?: string }) => CronTask;

const defaultScheduler: CronScheduler = (expression, task, options) =>
    cron.schedule(expression, task, options.timezone ? { timezone: options.timezone } : {});

/**
 * Owns the schedule refresh triggers: the recurring cron job and the manual
 * request. Triggers are serialized; one that arrives mid-refresh waits.
 */
export class ScheduleService {
    private mutex = new Mutex();
    private task: CronTask | null = null;

    constructor(
        readonly cache: ScheduleCache,
        private readonly cronPattern: string,
        private readonly timeZone?: string,
        private readonly scheduler: CronScheduler = defaultScheduler,
    ) {
        if (!cron.validate(cronPattern))
            throw new Error(`Invalid schedule cron pattern "${cronPattern}"`);
    }

    async start(): Promise<void> {
        this.task = this.scheduler(this.cronPattern, () => void this.runScheduled(), { timezone: this.timeZone });
        logger.info(`Schedule refresh scheduled with pattern "${this.cronPattern}"`);
        logger.info('Performing initial schedule refresh...');
        await this.runScheduled();
    }

    stop() {
        this.task?.stop();
        this.task = null;
    }

    get running(): boolean {
        return this.mutex.isLocked();
    }

    refreshNow(): Promise<RefreshSummary> {
        return this.mutex.runExclusive(async () => {
            logger.info('Refreshing schedules from all providers...');
            const summary = await this.cache.refresh();
            logger.info(`Schedule cache updated: ${summary.surfaces} surfaces, ${summary.events} events`);
            return summary;
        });
    }

    private async runScheduled(): Promise<void> {
        try {
            await this.refreshNow();
        } catch (error) {
            logger.error(`Failed to refresh schedules: ${errorMessage(error)}`);
        }
    }
}
