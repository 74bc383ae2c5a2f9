/**
 * One booking on one ice surface, normalized from a facility feed.
 * `start` and `end` are absolute instants; providers resolve their
 * facility-local wall-clock strings before building a record.
 */
export interface EventRecord {
    surfaceId: number;
    start: Date;
    end: Date;
    title: string;
    description?: string;
    eventType?: string;
    rawData?: Record<string, unknown>;
}

export interface ProgrammeBlock {
    start: Date;
    end: Date;
    title: string;
}

export type GroupedEvents = Map<number, EventRecord[]>;

export type TransportResult =
    | { ok: true; body: string }
    | { ok: false; stage: 'transport'; reason: string };

export type PayloadResult<T> =
    | { ok: true; records: T[] }
    | { ok: false; stage: 'payload'; reason: string };

export type RecordResult =
    | { ok: true; event: EventRecord }
    | { ok: false; reason: string };

export interface FetchOptions {
    params?: Record<string, string>;
    timeoutMs: number;
}

/**
 * Retrieves a remote document as text. Resolves to a failed result instead
 * of rejecting.
 */
export type FetchText = (url: string, options: FetchOptions) => Promise<TransportResult>;

export interface ScheduleSource {
    name(): string;
    isEnabled(): boolean;
    /** Resolves to an empty list when the facility cannot be read; never rejects. */
    fetchSchedule(windowStart: Date, windowEnd: Date): Promise<EventRecord[]>;
}
