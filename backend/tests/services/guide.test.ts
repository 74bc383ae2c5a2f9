import { describe, expect, it } from 'vitest';
import { GuideService } from '../../app/services/guide.js';
import { OPEN_ICE } from '../../app/schedule/timeline.js';
import type { ScheduleSnapshot } from '../../app/schedule/cache.js';
import type { FavoriteListing } from '../../app/services/catalog.js';

const utc = (iso: string) => new Date(`${iso}Z`);

const favorite: FavoriteListing = {
    venueId: 10,
    venueName: 'Westside Ice',
    city: 'Dublin',
    state: 'OH',
    surfaceId: 864,
    surfaceName: 'Rink 1',
    streamName: 'surface-864',
    playlistUrl: null,
};

const snapshot: ScheduleSnapshot = {
    grouped: new Map([[864, [{ surfaceId: 864, start: utc('2025-01-01T01:00:00'), end: utc('2025-01-01T02:30:00'), title: 'Learn to Skate' }]]]),
    lastRefreshed: utc('2025-01-01T00:00:00'),
    windowStart: utc('2025-01-01T00:00:00'),
    windowEnd: utc('2025-01-01T04:00:00'),
};

const guide = (favorites: FavoriteListing[]) => new GuideService(
    { listFavorites: () => favorites },
    { snapshot: () => snapshot, window: () => ({ start: utc('2025-01-01T00:00:00'), end: utc('2025-01-01T04:00:00') }) },
    { baseUrl: 'http://rinkguide.test:5000', generatorName: 'RinkGuide', groupTitle: 'LiveBarn', placeholderSeconds: 3600, timeZone: 'UTC' },
);

describe('GuideService', () => {
    it('builds a gap-free timeline from the cached snapshot', () => {
        expect(guide([favorite]).programmes(864).map(p => [p.start.toISOString(), p.title])).toEqual([
            ['2025-01-01T00:00:00.000Z', OPEN_ICE],
            ['2025-01-01T01:00:00.000Z', 'Learn to Skate'],
            ['2025-01-01T02:30:00.000Z', OPEN_ICE],
            ['2025-01-01T03:30:00.000Z', OPEN_ICE],
        ]);
    });

    it('fills a surface without events with open ice', () => {
        expect(guide([favorite]).programmes(865)).toHaveLength(4);
    });

    it('renders only the favorites', () => {
        const playlist = guide([favorite]).playlist().split('\n');
        expect(playlist).toHaveLength(3);
        expect(playlist[2]).toBe('http://rinkguide.test:5000/proxy/864');

        const xml = guide([favorite]).xmltv();
        expect(xml).toContain('<channel id="864">');
        expect(xml).toContain('start="20250101010000 +0000" stop="20250101023000 +0000"');
        expect(guide([]).playlist()).toBe('#EXTM3U');
    });
});
