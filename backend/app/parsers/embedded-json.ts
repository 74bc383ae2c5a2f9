import type { PayloadResult } from '../schedule/types.js';
import { errorMessage } from '../services/errors.js';

type ExtractResult =
    | { ok: true; text: string }
    | { ok: false; reason: string };

/**
 * Locate `<variable> = [ ... ]` in a page and return the bracketed literal.
 * The end is found by counting bracket depth, so nested arrays and objects
 * inside the list do not cut it short.
 */
function extractArrayLiteral(html: string, variable: string): ExtractResult {
    const marker = `${variable} =`;
    const index = html.indexOf(marker);
    if (index === -1)
        return { ok: false, reason: `variable ${variable} not found` };

    const start = html.indexOf('[', index + marker.length);
    if (start === -1)
        return { ok: false, reason: `no '[' after ${variable} assignment` };

    let depth = 0;
    for (let i = start; i < html.length; i++) {
        const ch = html[i];
        if (ch === '[') {
            depth++;
        } else if (ch === ']') {
            depth--;
            if (depth === 0)
                return { ok: true, text: html.slice(start, i + 1) };
        }
    }
    return { ok: false, reason: `no matching ']' for ${variable}` };
}

/**
 * Read the JSON array a page assigns to `variable`.
 */
function parseEmbeddedArray(html: string, variable: string): PayloadResult<unknown> {
    const extracted = extractArrayLiteral(html, variable);
    if (!extracted.ok)
        return { ok: false, stage: 'payload', reason: extracted.reason };

    let value: unknown;
    try {
        value = JSON.parse(extracted.text);
    } catch (error) {
        return { ok: false, stage: 'payload', reason: `invalid JSON in ${variable}: ${errorMessage(error)}` };
    }
    if (!Array.isArray(value))
        return { ok: false, stage: 'payload', reason: `${variable} is not an array` };

    return { ok: true, records: value };
}

export { extractArrayLiteral, parseEmbeddedArray };
