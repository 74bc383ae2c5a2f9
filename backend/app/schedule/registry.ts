import { logger } from '../services/logger.js';
import { errorMessage } from '../services/errors.js';
import type { EventRecord, ScheduleSource } from './types.js';

export interface SourceStat {
    source: string;
    count: number;
}

export interface RegistryResult {
    events: EventRecord[];
    stats: SourceStat[];
    skipped: string[];
}

export class SourceRegistry {
    readonly sources: readonly ScheduleSource[];

    constructor(sources: ScheduleSource[]) {
        this.sources = [...sources];
    }

    /**
     * Poll every enabled source over `[windowStart, windowEnd)` and concatenate
     * the results. A source that rejects despite its contract counts as zero.
     */
    async refresh(windowStart: Date, windowEnd: Date): Promise<RegistryResult> {
        const events: EventRecord[] = [];
        const stats: SourceStat[] = [];
        const skipped: string[] = [];

        for (const source of this.sources) {
            const name = source.name();
            if (!source.isEnabled()) {
                logger.info(`Skipping ${name} (disabled)`);
                skipped.push(name);
                continue;
            }

            let fetched: EventRecord[] = [];
            try {
                fetched = await source.fetchSchedule(windowStart, windowEnd);
            } catch (error) {
                logger.error(`${name} failed: ${errorMessage(error)}`);
            }
            events.push(...fetched);
            stats.push({ source: name, count: fetched.length });
        }

        const summary = stats.length > 0 ? stats.map(s => `${s.count} ${s.source}`).join(' + ') : '0';
        logger.info(`Schedules fetched: ${summary} = ${events.length} total events`);
        return { events, stats, skipped };
    }
}
