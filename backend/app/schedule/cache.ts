import { DateTime } from 'luxon';
import { groupBySurface } from './grouper.js';
import type { SourceRegistry, SourceStat } from './registry.js';
import type { EventRecord, GroupedEvents } from './types.js';

export interface ScheduleSnapshot {
    readonly grouped: ReadonlyMap<number, readonly EventRecord[]>;
    readonly lastRefreshed: Date | null;
    readonly windowStart: Date;
    readonly windowEnd: Date;
}

export interface RefreshSummary {
    surfaces: number;
    events: number;
    stats: SourceStat[];
    lastRefreshed: Date;
}

/**
 * Today 00:00 through the day after tomorrow 00:00, process-local time.
 */
export function forwardWindow(now: Date): { start: Date; end: Date } {
    const today = DateTime.fromJSDate(now).startOf('day');
    return { start: today.toJSDate(), end: today.plus({ days: 2 }).toJSDate() };
}

/**
 * Holds the last grouped schedule. A refresh builds the new snapshot aside
 * and publishes it with one assignment, so readers see either the previous
 * snapshot or the new one.
 */
export class ScheduleCache {
    private current: ScheduleSnapshot;

    constructor(
        private readonly registry: Pick<SourceRegistry, 'refresh'>,
        private readonly clock: () => Date = () => new Date(),
    ) {
        const { start, end } = forwardWindow(this.clock());
        this.current = { grouped: new Map(), lastRefreshed: null, windowStart: start, windowEnd: end };
    }

    snapshot(): ScheduleSnapshot {
        return this.current;
    }

    /** The window guides should render now; follows the clock between refreshes. */
    window(): { start: Date; end: Date } {
        return forwardWindow(this.clock());
    }

    async refresh(): Promise<RefreshSummary> {
        const { start, end } = forwardWindow(this.clock());
        const { events, stats } = await this.registry.refresh(start, end);
        const grouped: GroupedEvents = groupBySurface(events);
        const lastRefreshed = this.clock();

        this.current = Object.freeze({ grouped, lastRefreshed, windowStart: start, windowEnd: end });

        return { surfaces: grouped.size, events: events.length, stats, lastRefreshed };
    }
}
