import { parseEmbeddedArray } from '../../parsers/embedded-json.js';
import { DEFAULT_TITLE, FacilitySource, parseLocalTime, type SourceOptions } from '../source.js';
import type { EventRecord, PayloadResult, RecordResult, TransportResult } from '../types.js';

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

export interface LgriaOptions extends SourceOptions {
    surfaceId: number;
    variable: string;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const text = (value: unknown): string => (typeof value === 'string' ? value : '');

/**
 * Single-rink facility whose public schedule page embeds the bookings as a
 * JavaScript array literal.
 */
export class LgriaSource extends FacilitySource<unknown> {
    private readonly surfaceId: number;
    private readonly variable: string;

    constructor(options: LgriaOptions) {
        super(options);
        this.surfaceId = options.surfaceId;
        this.variable = options.variable;
    }

    name(): string {
        return 'Lou & Gib Reese Ice Arena';
    }

    surfaceIds(): number[] {
        return [this.surfaceId];
    }

    protected request(): Promise<TransportResult> {
        return this.options.fetchText(this.options.url, { timeoutMs: this.options.timeoutMs });
    }

    protected async parsePayload(body: string): Promise<PayloadResult<unknown>> {
        return parseEmbeddedArray(body, this.variable);
    }

    protected normalize(record: unknown, windowStart: Date, windowEnd: Date): RecordResult {
        if (!isObject(record))
            return { ok: false, reason: 'entry is not an object' };

        const start = parseLocalTime(record.EventStartTime, TIMESTAMP_FORMAT, this.options.timeZone);
        const end = parseLocalTime(record.EventEndTime, TIMESTAMP_FORMAT, this.options.timeZone);
        if (!start || !end)
            return { ok: false, reason: 'unreadable time' };
        if (start.getTime() >= end.getTime())
            return { ok: false, reason: 'ends before it starts' };
        if (start.getTime() < windowStart.getTime() || start.getTime() >= windowEnd.getTime())
            return { ok: false, reason: 'outside window' };

        const title = text(record.Description) || text(record.AccountName) || DEFAULT_TITLE;
        const event: EventRecord = {
            surfaceId: this.surfaceId,
            start,
            end,
            title: title.trim(),
            rawData: record,
        };
        const description = text(record.ScheduleNotes);
        const eventType = text(record.EventTypeName);
        if (description) event.description = description;
        if (eventType) event.eventType = eventType;
        return { ok: true, event };
    }

    async fetchSchedule(windowStart: Date, windowEnd: Date): Promise<EventRecord[]> {
        const events = await super.fetchSchedule(windowStart, windowEnd);
        return events.sort((a, b) => a.start.getTime() - b.start.getTime());
    }
}
