import { describe, expect, it } from 'vitest';
import { ScheduleService, type CronScheduler } from '../../app/services/scheduler.js';
import { ScheduleCache } from '../../app/schedule/cache.js';
import type { RegistryResult } from '../../app/schedule/registry.js';

const emptyResult: RegistryResult = { events: [], stats: [], skipped: [] };

const fakeCron = () => {
    const jobs: { expression: string; task: () => void; timezone?: string; stopped: boolean }[] = [];
    const scheduler: CronScheduler = (expression, task, options) => {
        const job = { expression, task, timezone: options.timezone, stopped: false };
        jobs.push(job);
        return { stop: () => { job.stopped = true; } };
    };
    return { jobs, scheduler };
};

const countingCache = () => {
    let calls = 0;
    const cache = new ScheduleCache({
        refresh: async () => {
            calls++;
            return emptyResult;
        },
    });
    return { cache, calls: () => calls };
};

describe('ScheduleService', () => {
    it('rejects an invalid cron pattern', () => {
        const { cache } = countingCache();
        expect(() => new ScheduleService(cache, 'not a cron', undefined, fakeCron().scheduler)).toThrow('Invalid schedule cron pattern');
    });

    it('registers the job and refreshes once on start', async () => {
        const { cache, calls } = countingCache();
        const cron = fakeCron();
        const service = new ScheduleService(cache, '0 3 * * *', 'America/New_York', cron.scheduler);
        await service.start();

        expect(cron.jobs.map(j => [j.expression, j.timezone])).toEqual([['0 3 * * *', 'America/New_York']]);
        expect(calls()).toBe(1);
        expect(cache.snapshot().lastRefreshed).not.toBeNull();

        service.stop();
        expect(cron.jobs[0].stopped).toBe(true);
    });

    it('serializes overlapping refreshes', async () => {
        let active = 0;
        let maxActive = 0;
        const cache = new ScheduleCache({
            refresh: async () => {
                active++;
                maxActive = Math.max(maxActive, active);
                await new Promise(resolve => setTimeout(resolve, 5));
                active--;
                return emptyResult;
            },
        });
        const service = new ScheduleService(cache, '0 3 * * *', undefined, fakeCron().scheduler);

        await Promise.all([service.refreshNow(), service.refreshNow(), service.refreshNow()]);
        expect(maxActive).toBe(1);
    });

    it('keeps running when a scheduled refresh fails', async () => {
        const cache = new ScheduleCache({
            refresh: async () => {
                throw new Error('registry down');
            },
        });
        const cron = fakeCron();
        const service = new ScheduleService(cache, '*/5 * * * *', undefined, cron.scheduler);

        await expect(service.start()).resolves.toBeUndefined();
        await expect(service.refreshNow()).rejects.toThrow('registry down');
        expect(service.running).toBe(false);
    });
});
