import xml2js from 'xml2js';
import type { PayloadResult } from '../schedule/types.js';
import { errorMessage } from '../services/errors.js';

/** Flat view of one `<event>`: its `id` attribute plus every child's trimmed text. */
export type FeedRecord = Record<string, string>;

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * xml2js gives each child as an array; a node is either its text or an
 * object with `_` holding the text when it carries attributes.
 */
const parseField = (field: unknown): string => {
    if (!Array.isArray(field) || field.length === 0) return '';
    const value: unknown = field[0];
    if (typeof value === 'string') return value.trim();
    if (isObject(value) && typeof value._ === 'string') return value._.trim();
    return '';
};

/**
 * Parse a booking feed whose root element holds a list of `<event>` children.
 */
async function parseEventFeed(xmlContent: string, eventTag = 'event'): Promise<PayloadResult<FeedRecord>> {
    const parser = new xml2js.Parser();

    let result: unknown;
    try {
        result = await parser.parseStringPromise(xmlContent);
    } catch (error) {
        return { ok: false, stage: 'payload', reason: `malformed XML: ${errorMessage(error)}` };
    }

    if (!isObject(result))
        return { ok: false, stage: 'payload', reason: 'document has no root element' };

    const root = Object.values(result)[0];
    // an empty root element parses to a bare string
    if (!isObject(root))
        return { ok: true, records: [] };

    const events = root[eventTag];
    if (events === undefined)
        return { ok: true, records: [] };
    if (!Array.isArray(events))
        return { ok: false, stage: 'payload', reason: `unexpected <${eventTag}> content` };

    const records: FeedRecord[] = [];
    for (const event of events) {
        const record: FeedRecord = { id: '' };
        if (isObject(event)) {
            const attributes = event.$;
            if (isObject(attributes) && typeof attributes.id === 'string')
                record.id = attributes.id;
            for (const [tag, field] of Object.entries(event)) {
                if (tag === '$' || tag === '_') continue;
                record[tag] = parseField(field);
            }
        }
        records.push(record);
    }
    return { ok: true, records };
}

export { parseEventFeed };
