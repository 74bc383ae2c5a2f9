import type { EventRecord, GroupedEvents } from './types.js';

/**
 * Partition events by surface and order each partition by start time.
 * Array#sort is stable, so equal starts keep their fetch order.
 */
export function groupBySurface(events: readonly EventRecord[]): GroupedEvents {
    const grouped: GroupedEvents = new Map();
    for (const event of events) {
        const list = grouped.get(event.surfaceId);
        if (list)
            list.push(event);
        else
            grouped.set(event.surfaceId, [event]);
    }
    for (const list of grouped.values())
        list.sort((a, b) => a.start.getTime() - b.start.getTime());
    return grouped;
}
