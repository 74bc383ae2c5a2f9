import type { EventRecord, ProgrammeBlock } from './types.js';
import { DEFAULT_TITLE } from './source.js';

export const OPEN_ICE = 'Open Ice';

const HOUR_MS = 60 * 60 * 1000;

export type OverlapPolicy = 'keep' | 'drop';

export interface TimelineOptions {
    /**
     * `keep` emits every event and moves the cursor to its end, even
     * backwards. `drop` skips events that start before the cursor.
     */
    overlap?: OverlapPolicy;
}

const fill = (blocks: ProgrammeBlock[], from: number, to: number): number => {
    let cursor = from;
    while (cursor < to) {
        const next = Math.min(cursor + HOUR_MS, to);
        blocks.push({ start: new Date(cursor), end: new Date(next), title: OPEN_ICE });
        cursor = next;
    }
    return cursor;
};

/**
 * Tile `[windowStart, windowEnd)` with one surface's sorted events, filling
 * every gap with "Open Ice" blocks of at most one hour.
 *
 * A window that ends before it starts yields no blocks. Events are not
 * clipped to the window.
 */
export function buildTimeline(
    events: readonly EventRecord[],
    windowStart: Date,
    windowEnd: Date,
    options: TimelineOptions = {},
): ProgrammeBlock[] {
    const start = windowStart.getTime();
    const end = windowEnd.getTime();
    if (!(start <= end))
        return [];

    const overlap = options.overlap ?? 'keep';
    const blocks: ProgrammeBlock[] = [];
    let cursor = start;

    for (const event of events) {
        const eventStart = event.start.getTime();
        const eventEnd = event.end.getTime();
        if (overlap === 'drop' && eventStart < cursor)
            continue;

        cursor = fill(blocks, cursor, eventStart);
        blocks.push({
            start: event.start,
            end: event.end,
            title: event.title.trim() || DEFAULT_TITLE,
        });
        cursor = eventEnd;
    }

    fill(blocks, cursor, end);
    return blocks;
}
