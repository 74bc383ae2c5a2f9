import { parse } from 'yaml';
import { readFile } from 'node:fs/promises';
import dotenv from 'dotenv';
import path from 'path';
import URL from 'url';
import { ConfigError, errorMessage } from '../services/errors.js';

const __dirname = path.dirname(URL.fileURLToPath(import.meta.url));

dotenv.config();

/*

sources:
  chiller:
    type: chiller
    description: "OhioHealth Chiller rinks"
    url: https://thechiller.com/admin/scheduler/init-scheduler-live.cfm
    timeZone: America/New_York
    iceSheets: ["1", "2"]
    surfaces:
      "1": 864
      "2": 865
  lgria:
    type: lgria
    url: https://lgria.finnlyconnect.com/schedule/201
    surfaceId: 2445
    variable: _onlineScheduleList
    active: false

*/

export const CONFIG_YML_PATH = path.join(__dirname, 'config.yml');
const defaultDataDir = path.join(__dirname, '..', 'data');

interface SourceConfigBase {
    description?: string;
    url: string;
    active: boolean;
    timeZone: string;
}

export interface ChillerSourceConfig extends SourceConfigBase {
    type: 'chiller';
    iceSheets: string[];
    surfaces: Record<string, number>;
}

export interface LgriaSourceConfig extends SourceConfigBase {
    type: 'lgria';
    surfaceId: number;
    variable: string;
}

export type SourceConfig = ChillerSourceConfig | LgriaSourceConfig;

export interface Config {
    paths: {
        data: string;
        catalog: string;
    };
    address: string;
    port: number;
    publicHost?: string;
    publicPort: number;
    logLevel: string;
    requestTimeoutMs: number;
    schedule: {
        cron: string;
        timeZone?: string;
    };
    sources: Record<string, SourceConfig>;
    catalog: {
        url: string;
        timeoutMs: number;
    };
    guide: {
        generatorName: string;
        groupTitle: string;
        placeholderSeconds: number;
        /** Zone XMLTV times are written in; process-local when absent. */
        timeZone?: string;
    };
    stream: {
        streamlink: string;
        captureCommand?: string;
        captureTimeoutMs: number;
        refreshMarginMinutes: number;
        firstChunkTimeoutMs: number;
    };
}

type Env = Record<string, string | undefined>;

const DEFAULT_TIME_ZONE = 'America/New_York';

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const section = (value: unknown, name: string): Record<string, unknown> => {
    if (value === undefined || value === null) return {};
    if (!isObject(value)) throw new ConfigError(`"${name}" must be a mapping`);
    return value;
};

const str = (value: unknown, name: string, fallback?: string): string => {
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (value === undefined || value === null || value === '') {
        if (fallback !== undefined) return fallback;
        throw new ConfigError(`"${name}" is required`);
    }
    throw new ConfigError(`"${name}" must be a string`);
};

const num = (value: unknown, name: string, fallback: number): number => {
    if (value === undefined || value === null || value === '') return fallback;
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) throw new ConfigError(`"${name}" must be a non-negative number`);
    return parsed;
};

const optional = (value: string | undefined): string | undefined => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
};

const toSource = (key: string, entry: unknown): SourceConfig => {
    const raw = section(entry, `sources.${key}`);
    const base = {
        description: typeof raw.description === 'string' ? raw.description : undefined,
        url: str(raw.url, `sources.${key}.url`),
        active: raw.active === undefined ? true : raw.active === true,
        timeZone: str(raw.timeZone, `sources.${key}.timeZone`, DEFAULT_TIME_ZONE),
    };

    const type = raw.type ?? key;
    if (type === 'chiller') {
        const mapping = section(raw.surfaces, `sources.${key}.surfaces`);
        const surfaces: Record<string, number> = {};
        for (const productId in mapping) {
            const surfaceId = mapping[productId];
            if (typeof surfaceId !== 'number' || !Number.isInteger(surfaceId))
                throw new ConfigError(`"sources.${key}.surfaces.${productId}" must be an integer surface id`);
            surfaces[productId] = surfaceId;
        }
        let iceSheets = Object.keys(surfaces);
        if (raw.iceSheets !== undefined) {
            if (!Array.isArray(raw.iceSheets))
                throw new ConfigError(`"sources.${key}.iceSheets" must be a list`);
            iceSheets = raw.iceSheets.map((id: unknown) => String(id));
        }
        return { ...base, type, iceSheets, surfaces };
    }
    if (type === 'lgria') {
        const surfaceId = raw.surfaceId;
        if (typeof surfaceId !== 'number' || !Number.isInteger(surfaceId))
            throw new ConfigError(`"sources.${key}.surfaceId" must be an integer surface id`);
        return {
            ...base,
            type,
            surfaceId,
            variable: str(raw.variable, `sources.${key}.variable`, '_onlineScheduleList'),
        };
    }
    throw new ConfigError(`Unknown source type "${String(type)}" for "${key}"`);
};

/**
 * Build the configuration from YAML content plus environment overrides.
 */
export function buildConfig(content: unknown, env: Env = process.env): Config {
    const root = section(content, 'root');
    const schedule = section(root.schedule, 'schedule');
    const catalog = section(root.catalog, 'catalog');
    const guide = section(root.guide, 'guide');
    const stream = section(root.stream, 'stream');
    const sources: Record<string, SourceConfig> = {};
    const rawSources = section(root.sources, 'sources');
    for (const key in rawSources)
        sources[key] = toSource(key, rawSources[key]);

    const dataDir = path.resolve(env.DATA_DIR?.trim() || defaultDataDir);
    const port = num(env.PORT, 'PORT', 5000);

    return {
        paths: {
            data: dataDir,
            catalog: path.join(dataDir, 'catalog.json'),
        },
        address: env.ADDRESS?.trim() || '0.0.0.0',
        port,
        publicHost: optional(env.PUBLIC_HOST),
        publicPort: num(env.PUBLIC_PORT, 'PUBLIC_PORT', port),
        logLevel: env.LOG_LEVEL?.trim() || 'info',
        requestTimeoutMs: num(env.REQUEST_TIMEOUT_MS ?? root.requestTimeoutMs, 'requestTimeoutMs', 15000),
        schedule: {
            cron: str(env.SCHEDULE_CRON ?? schedule.cron, 'schedule.cron', '0 3 * * *'),
            timeZone: optional(env.SCHEDULE_TIMEZONE) ?? (typeof schedule.timeZone === 'string' ? schedule.timeZone : undefined),
        },
        sources,
        catalog: {
            url: str(env.CATALOG_URL ?? catalog.url, 'catalog.url', 'https://watchapi.livebarn.com/api/v2.0.0/staticdata/venues'),
            timeoutMs: num(catalog.timeoutMs, 'catalog.timeoutMs', 30000),
        },
        guide: {
            generatorName: str(guide.generatorName, 'guide.generatorName', 'RinkGuide'),
            groupTitle: str(guide.groupTitle, 'guide.groupTitle', 'LiveBarn'),
            placeholderSeconds: num(guide.placeholderSeconds, 'guide.placeholderSeconds', 3600),
            timeZone: optional(env.GUIDE_TIMEZONE) ?? (typeof guide.timeZone === 'string' ? optional(guide.timeZone) : undefined),
        },
        stream: {
            streamlink: str(env.STREAMLINK_PATH ?? stream.streamlink, 'stream.streamlink', 'streamlink'),
            captureCommand: optional(env.CAPTURE_COMMAND) ?? (typeof stream.captureCommand === 'string' ? optional(stream.captureCommand) : undefined),
            captureTimeoutMs: num(env.CAPTURE_TIMEOUT_MS ?? stream.captureTimeoutMs, 'stream.captureTimeoutMs', 45000),
            refreshMarginMinutes: num(stream.refreshMarginMinutes, 'stream.refreshMarginMinutes', 5),
            firstChunkTimeoutMs: num(stream.firstChunkTimeoutMs, 'stream.firstChunkTimeoutMs', 30000),
        },
    };
}

export async function loadConfig(file = process.env.CONFIG_PATH?.trim() || CONFIG_YML_PATH, env: Env = process.env): Promise<Config> {
    let content: string;
    try {
        content = await readFile(file, 'utf8');
    } catch (err) {
        throw new ConfigError(`Cannot read config file ${file}: ${errorMessage(err)}`);
    }

    let parsed: unknown;
    try {
        parsed = parse(content);
    } catch (err) {
        throw new ConfigError(`Cannot parse config file ${file}: ${errorMessage(err)}`);
    }

    return buildConfig(parsed, env);
}
