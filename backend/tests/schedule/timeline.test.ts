import { describe, expect, it } from 'vitest';
import { buildTimeline, OPEN_ICE } from '../../app/schedule/timeline.js';
import { DEFAULT_TITLE } from '../../app/schedule/source.js';
import type { EventRecord, ProgrammeBlock } from '../../app/schedule/types.js';

const at = (iso: string) => new Date(`${iso}Z`);

const event = (start: string, end: string, title: string): EventRecord => ({
    surfaceId: 864,
    start: at(start),
    end: at(end),
    title,
});

const spans = (blocks: ProgrammeBlock[]) =>
    blocks.map(block => [block.start.toISOString(), block.end.toISOString(), block.title]);

describe('buildTimeline', () => {
    const windowStart = at('2025-01-01T00:00:00');
    const windowEnd = at('2025-01-03T00:00:00');

    it('fills around a single booking', () => {
        const blocks = buildTimeline(
            [event('2025-01-01T09:30:00', '2025-01-01T11:00:00', 'Public Skate')],
            windowStart,
            windowEnd,
        );

        expect(blocks).toHaveLength(48);
        expect(spans(blocks.slice(0, 2))).toEqual([
            ['2025-01-01T00:00:00.000Z', '2025-01-01T01:00:00.000Z', OPEN_ICE],
            ['2025-01-01T01:00:00.000Z', '2025-01-01T02:00:00.000Z', OPEN_ICE],
        ]);
        expect(spans(blocks.slice(9, 12))).toEqual([
            ['2025-01-01T09:00:00.000Z', '2025-01-01T09:30:00.000Z', OPEN_ICE],
            ['2025-01-01T09:30:00.000Z', '2025-01-01T11:00:00.000Z', 'Public Skate'],
            ['2025-01-01T11:00:00.000Z', '2025-01-01T12:00:00.000Z', OPEN_ICE],
        ]);
        expect(spans(blocks.slice(-1))).toEqual([
            ['2025-01-02T23:00:00.000Z', '2025-01-03T00:00:00.000Z', OPEN_ICE],
        ]);
    });

    it('tiles the window without gaps', () => {
        const blocks = buildTimeline(
            [
                event('2025-01-01T06:15:00', '2025-01-01T07:45:00', 'Learn to Skate'),
                event('2025-01-01T07:45:00', '2025-01-01T09:00:00', 'Hockey Practice'),
                event('2025-01-02T20:10:00', '2025-01-02T21:20:00', 'Adult League'),
            ],
            windowStart,
            windowEnd,
        );

        expect(blocks[0].start).toEqual(windowStart);
        expect(blocks[blocks.length - 1].end).toEqual(windowEnd);
        for (let i = 1; i < blocks.length; i++)
            expect(blocks[i].start.getTime()).toBe(blocks[i - 1].end.getTime());
        for (const block of blocks.filter(b => b.title === OPEN_ICE))
            expect(block.end.getTime() - block.start.getTime()).toBeLessThanOrEqual(60 * 60 * 1000);
    });

    it('returns only filler when there are no events', () => {
        const blocks = buildTimeline([], at('2025-01-01T00:00:00'), at('2025-01-01T02:30:00'));
        expect(spans(blocks)).toEqual([
            ['2025-01-01T00:00:00.000Z', '2025-01-01T01:00:00.000Z', OPEN_ICE],
            ['2025-01-01T01:00:00.000Z', '2025-01-01T02:00:00.000Z', OPEN_ICE],
            ['2025-01-01T02:00:00.000Z', '2025-01-01T02:30:00.000Z', OPEN_ICE],
        ]);
    });

    it('returns nothing for an empty or inverted window', () => {
        expect(buildTimeline([], windowStart, windowStart)).toEqual([]);
        expect(buildTimeline([], windowEnd, windowStart)).toEqual([]);
    });

    it('falls back to the default title for blank titles', () => {
        const blocks = buildTimeline(
            [event('2025-01-01T00:00:00', '2025-01-01T01:00:00', '   ')],
            at('2025-01-01T00:00:00'),
            at('2025-01-01T01:00:00'),
        );
        expect(spans(blocks)).toEqual([
            ['2025-01-01T00:00:00.000Z', '2025-01-01T01:00:00.000Z', DEFAULT_TITLE],
        ]);
    });

    it('keeps overlapping events by default', () => {
        const blocks = buildTimeline(
            [
                event('2025-01-01T00:00:00', '2025-01-01T02:00:00', 'Tournament'),
                event('2025-01-01T01:00:00', '2025-01-01T01:30:00', 'Skills Clinic'),
            ],
            at('2025-01-01T00:00:00'),
            at('2025-01-01T02:00:00'),
        );
        expect(spans(blocks)).toEqual([
            ['2025-01-01T00:00:00.000Z', '2025-01-01T02:00:00.000Z', 'Tournament'],
            ['2025-01-01T01:00:00.000Z', '2025-01-01T01:30:00.000Z', 'Skills Clinic'],
            ['2025-01-01T01:30:00.000Z', '2025-01-01T02:00:00.000Z', OPEN_ICE],
        ]);
    });

    it('drops overlapping events when asked', () => {
        const blocks = buildTimeline(
            [
                event('2025-01-01T00:00:00', '2025-01-01T02:00:00', 'Tournament'),
                event('2025-01-01T01:00:00', '2025-01-01T01:30:00', 'Skills Clinic'),
            ],
            at('2025-01-01T00:00:00'),
            at('2025-01-01T02:00:00'),
            { overlap: 'drop' },
        );
        expect(spans(blocks)).toEqual([
            ['2025-01-01T00:00:00.000Z', '2025-01-01T02:00:00.000Z', 'Tournament'],
        ]);
    });
});
