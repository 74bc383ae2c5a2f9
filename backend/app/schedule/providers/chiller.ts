import { parseEventFeed, type FeedRecord } from '../../parsers/xml-feed.js';
import { DEFAULT_TITLE, FacilitySource, parseLocalTime, type SourceOptions } from '../source.js';
import type { PayloadResult, RecordResult, TransportResult } from '../types.js';

const TIMESTAMP = /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})\.(\d{1,6})$/;

export interface ChillerOptions extends SourceOptions {
    iceSheets: string[];
    surfaces: Record<string, number>;
}

/**
 * Parse "2025-12-02 09:30:00.0". The fraction may carry up to six digits;
 * anything past milliseconds is dropped.
 */
export function parseChillerTime(value: string | undefined, timeZone: string): Date | null {
    const match = (value ?? '').trim().match(TIMESTAMP);
    if (!match) return null;
    const millis = match[2].padEnd(3, '0').slice(0, 3);
    return parseLocalTime(`${match[1]}.${millis}`, 'yyyy-MM-dd HH:mm:ss.SSS', timeZone);
}

/**
 * Booking feed served as XML by the facility's scheduler API, queried by
 * date range.
 */
export class ChillerSource extends FacilitySource<FeedRecord> {
    private readonly iceSheets: Set<string>;
    private readonly surfaces: Record<string, number>;

    constructor(options: ChillerOptions) {
        super(options);
        this.iceSheets = new Set(options.iceSheets);
        this.surfaces = options.surfaces;
    }

    name(): string {
        return 'OhioHealth Chiller';
    }

    surfaceIds(): number[] {
        return Object.values(this.surfaces);
    }

    protected request(windowStart: Date, windowEnd: Date): Promise<TransportResult> {
        return this.options.fetchText(this.options.url, {
            params: {
                timeshift: '300',
                uid: '1',
                from: this.facilityDate(windowStart),
                to: this.facilityDate(windowEnd),
            },
            timeoutMs: this.options.timeoutMs,
        });
    }

    protected parsePayload(body: string): Promise<PayloadResult<FeedRecord>> {
        return parseEventFeed(body);
    }

    protected normalize(record: FeedRecord): RecordResult {
        const productId = record.productid ?? '';
        if (!this.iceSheets.has(productId))
            return { ok: false, reason: `product ${productId || '(none)'} is not an ice sheet` };
        if (!Object.hasOwn(this.surfaces, productId))
            return { ok: false, reason: `product ${productId} has no surface mapping` };
        const surfaceId = this.surfaces[productId];

        const start = parseChillerTime(record.start_date, this.options.timeZone);
        const end = parseChillerTime(record.end_date, this.options.timeZone);
        if (!start || !end)
            return { ok: false, reason: `event ${record.id}: unreadable time` };
        if (start.getTime() >= end.getTime())
            return { ok: false, reason: `event ${record.id}: ends before it starts` };

        return {
            ok: true,
            event: {
                surfaceId,
                start,
                end,
                title: (record.text || DEFAULT_TITLE).trim(),
                rawData: { ...record },
            },
        };
    }
}
