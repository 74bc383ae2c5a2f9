import { DateTime } from 'luxon';
import { logger } from '../services/logger.js';
import { errorMessage } from '../services/errors.js';
import type {
    EventRecord,
    FetchText,
    PayloadResult,
    RecordResult,
    ScheduleSource,
    TransportResult,
} from './types.js';

export const DEFAULT_TITLE = 'Ice Time';

export interface SourceOptions {
    url: string;
    /** IANA name or fixed offset such as "UTC-5"; the facility's wall clock. */
    timeZone: string;
    timeoutMs: number;
    active: boolean;
    fetchText: FetchText;
}

/**
 * Parse a naive facility-local timestamp in the given zone. Returns null
 * when the string does not match or the zone is unknown.
 */
export function parseLocalTime(value: unknown, format: string, timeZone: string): Date | null {
    if (typeof value !== 'string' || value.trim() === '')
        return null;
    const parsed = DateTime.fromFormat(value.trim(), format, { zone: timeZone });
    return parsed.isValid ? parsed.toJSDate() : null;
}

/**
 * Shared pipeline for facility adapters: transport, payload parse, then
 * per-record normalization. Each stage reports a result value; only the
 * first two abort a fetch.
 */
export abstract class FacilitySource<TRecord> implements ScheduleSource {
    protected readonly options: SourceOptions;

    constructor(options: SourceOptions) {
        this.options = options;
    }

    abstract name(): string;

    /** Surface ids this source can produce. */
    abstract surfaceIds(): number[];

    protected abstract request(windowStart: Date, windowEnd: Date): Promise<TransportResult>;

    protected abstract parsePayload(body: string): Promise<PayloadResult<TRecord>>;

    protected abstract normalize(record: TRecord, windowStart: Date, windowEnd: Date): RecordResult;

    isEnabled(): boolean {
        return this.options.active;
    }

    /** Format an instant as a calendar date in the facility's zone. */
    protected facilityDate(instant: Date): string {
        return DateTime.fromJSDate(instant, { zone: this.options.timeZone }).toFormat('yyyy-MM-dd');
    }

    async fetchSchedule(windowStart: Date, windowEnd: Date): Promise<EventRecord[]> {
        try {
            const transport = await this.request(windowStart, windowEnd);
            if (!transport.ok) {
                logger.error(`Failed to fetch ${this.name()} schedule (${transport.stage}): ${transport.reason}`);
                return [];
            }

            const payload = await this.parsePayload(transport.body);
            if (!payload.ok) {
                logger.error(`Failed to read ${this.name()} schedule (${payload.stage}): ${payload.reason}`);
                return [];
            }

            const events: EventRecord[] = [];
            let skipped = 0;
            for (const record of payload.records) {
                const result = this.normalize(record, windowStart, windowEnd);
                if (result.ok) {
                    events.push(result.event);
                } else {
                    skipped++;
                    logger.debug(`${this.name()}: skipped record (${result.reason})`);
                }
            }

            logger.info(`${this.name()}: ${events.length} events (${skipped} skipped of ${payload.records.length})`);
            return events;
        } catch (error) {
            logger.error(`Unexpected failure in ${this.name()} schedule: ${errorMessage(error)}`);
            return [];
        }
    }
}
