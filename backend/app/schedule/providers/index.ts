import type { Config } from '../../config/index.js';
import type { FetchText, ScheduleSource } from '../types.js';
import { ChillerSource } from './chiller.js';
import { LgriaSource } from './lgria.js';

/**
 * Instantiate one adapter per configured facility, in config order.
 */
export function createSources(config: Pick<Config, 'sources' | 'requestTimeoutMs'>, fetchText: FetchText): ScheduleSource[] {
    return Object.values(config.sources).map(source => {
        const common = {
            url: source.url,
            timeZone: source.timeZone,
            active: source.active,
            timeoutMs: config.requestTimeoutMs,
            fetchText,
        };
        switch (source.type) {
            case 'chiller':
                return new ChillerSource({ ...common, iceSheets: source.iceSheets, surfaces: source.surfaces });
            case 'lgria':
                return new LgriaSource({ ...common, surfaceId: source.surfaceId, variable: source.variable });
        }
    });
}

export { ChillerSource, LgriaSource };
