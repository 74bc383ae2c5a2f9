import { buildPlaylist } from '../guide/m3u.js';
import { buildXMLTV, type GuideChannel } from '../guide/xmltv.js';
import { buildTimeline, type TimelineOptions } from '../schedule/timeline.js';
import type { ScheduleCache } from '../schedule/cache.js';
import type { ProgrammeBlock } from '../schedule/types.js';
import type { CatalogService } from './catalog.js';

export interface GuideOptions {
    baseUrl: string;
    generatorName: string;
    groupTitle: string;
    placeholderSeconds: number;
    timeZone?: string;
    timeline?: TimelineOptions;
}

/**
 * Renders the favorites as playlist and guide. Reads only the cached
 * schedule snapshot; never fetches.
 */
export class GuideService {
    constructor(
        private readonly catalog: Pick<CatalogService, 'listFavorites'>,
        private readonly cache: Pick<ScheduleCache, 'snapshot' | 'window'>,
        private readonly options: GuideOptions,
    ) { }

    programmes(surfaceId: number): ProgrammeBlock[] {
        const events = this.cache.snapshot().grouped.get(surfaceId) ?? [];
        const { start, end } = this.cache.window();
        return buildTimeline(events, start, end, this.options.timeline);
    }

    playlist(): string {
        const entries = this.catalog.listFavorites().map(fav => ({
            surfaceId: fav.surfaceId,
            venueName: fav.venueName,
            surfaceName: fav.surfaceName,
            city: fav.city,
            state: fav.state,
        }));
        return buildPlaylist(entries, {
            baseUrl: this.options.baseUrl,
            groupTitle: this.options.groupTitle,
            placeholderSeconds: this.options.placeholderSeconds,
        });
    }

    xmltv(): string {
        const channels: GuideChannel[] = this.catalog.listFavorites().map(fav => ({
            surfaceId: fav.surfaceId,
            venueName: fav.venueName,
            surfaceName: fav.surfaceName,
            programmes: this.programmes(fav.surfaceId),
        }));
        return buildXMLTV(channels, {
            generatorName: this.options.generatorName,
            timeZone: this.options.timeZone,
        });
    }
}
