import { describe, expect, it } from 'vitest';
import { LgriaSource } from '../../../app/schedule/providers/lgria.js';
import type { FetchText } from '../../../app/schedule/types.js';

const entries = [
    {
        EventStartTime: '2025-12-03T18:00:00',
        EventEndTime: '2025-12-03T19:30:00',
        Description: 'Adult Hockey',
        AccountName: 'Rink League',
        EventTypeName: 'Hockey',
        ScheduleNotes: 'Full gear required',
    },
    {
        EventStartTime: '2025-12-02T12:00:00',
        EventEndTime: '2025-12-02T14:00:00',
        Description: '',
        AccountName: 'Figure Skating Club',
        EventTypeName: '',
    },
    {
        EventStartTime: '2025-12-02T08:00:00',
        EventEndTime: '2025-12-02T09:00:00',
    },
    { EventStartTime: '2025-12-05T08:00:00', EventEndTime: '2025-12-05T09:00:00', Description: 'Later' },
    { EventStartTime: '2025-12-02T10:00:00', EventEndTime: '2025-12-02T09:00:00', Description: 'Backwards' },
    { EventStartTime: 'soon', EventEndTime: '2025-12-02T09:00:00', Description: 'Unreadable' },
    'not an entry',
];

const page = (body: string) => `<html><head><script>
var config = { nested: [1, 2] };
var _onlineScheduleList = ${body};
var other = [];
</script></head><body></body></html>`;

const windowStart = new Date('2025-12-02T05:00:00Z');
const windowEnd = new Date('2025-12-04T05:00:00Z');

const source = (fetchText: FetchText) => new LgriaSource({
    url: 'https://lgria.test/schedule/201',
    timeZone: 'UTC-5',
    timeoutMs: 1000,
    active: true,
    fetchText,
    surfaceId: 2445,
    variable: '_onlineScheduleList',
});

const serving = (body: string): FetchText => async () => ({ ok: true, body });

describe('LgriaSource', () => {
    it('reads bookings from the embedded list, sorted by start', async () => {
        const events = await source(serving(page(JSON.stringify(entries)))).fetchSchedule(windowStart, windowEnd);

        expect(events.map(e => [e.start.toISOString(), e.end.toISOString(), e.title])).toEqual([
            ['2025-12-02T13:00:00.000Z', '2025-12-02T14:00:00.000Z', 'Ice Time'],
            ['2025-12-02T17:00:00.000Z', '2025-12-02T19:00:00.000Z', 'Figure Skating Club'],
            ['2025-12-03T23:00:00.000Z', '2025-12-04T00:30:00.000Z', 'Adult Hockey'],
        ]);
        expect(events.every(e => e.surfaceId === 2445)).toBe(true);
    });

    it('carries notes and event type when present', async () => {
        const events = await source(serving(page(JSON.stringify(entries)))).fetchSchedule(windowStart, windowEnd);
        const hockey = events[2];
        expect(hockey.description).toBe('Full gear required');
        expect(hockey.eventType).toBe('Hockey');
        expect(events[1].description).toBeUndefined();
        expect(events[1].eventType).toBeUndefined();
    });

    it('returns nothing when the list is missing', async () => {
        const html = '<html><script>var somethingElse = [];</script></html>';
        expect(await source(serving(html)).fetchSchedule(windowStart, windowEnd)).toEqual([]);
    });

    it('returns nothing when the list is not JSON', async () => {
        expect(await source(serving(page("[{ EventStartTime: 'x' }]"))).fetchSchedule(windowStart, windowEnd)).toEqual([]);
    });

    it('returns nothing when the page cannot be fetched', async () => {
        const failing: FetchText = async () => ({ ok: false, stage: 'transport', reason: 'timed out after 1000ms' });
        expect(await source(failing).fetchSchedule(windowStart, windowEnd)).toEqual([]);
    });

    it('names its single surface', () => {
        const lgria = source(serving(''));
        expect(lgria.name()).toBe('Lou & Gib Reese Ice Arena');
        expect(lgria.surfaceIds()).toEqual([2445]);
    });
});
