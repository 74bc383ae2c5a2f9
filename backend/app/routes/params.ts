import { ValidationError } from '../services/errors.js';

/**
 * Route ids are positive integers; anything else is a client error.
 */
export function parseId(value: string | undefined, label: string): number {
    const id = Number(value);
    if (!value || !Number.isInteger(id) || id <= 0)
        throw new ValidationError(`Invalid ${label} "${value ?? ''}"`);
    return id;
}

/** Optional non-negative integer query parameter. */
export function parseCount(value: unknown, label: string): number | undefined {
    if (value === undefined || value === '')
        return undefined;
    const count = typeof value === 'string' ? Number(value) : NaN;
    if (!Number.isInteger(count) || count < 0)
        throw new ValidationError(`Invalid ${label} "${String(value)}"`);
    return count;
}
