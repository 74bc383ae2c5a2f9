import axios from 'axios';
import { logger } from './logger.js';
import type { CatalogService } from './catalog.js';

export interface SyncResult {
    venues: number;
    surfaces: number;
    skipped: number;
}

type Fetch = (url: string, timeoutMs: number) => Promise<unknown>;

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const STATE_KEYS = ['state', 'stateCode', 'state_code', 'province', 'provinceCode', 'stateProvince', 'region'];
const POSTAL_KEYS = ['postalCode', 'postal_code', 'zip', 'zipCode'];

// regions name the same field differently
const firstText = (record: Record<string, unknown>, keys: string[]): string => {
    for (const key of keys) {
        const value = record[key];
        if (typeof value === 'string' && value.trim()) return value.trim();
    }
    return '';
};

const text = (value: unknown): string => (typeof value === 'string' ? value : '');

const coordinate = (value: unknown): number | null =>
    typeof value === 'number' && Number.isFinite(value) ? value : null;

const integer = (value: unknown): number | null => {
    const parsed = typeof value === 'string' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isInteger(parsed) ? parsed : null;
};

const getJson: Fetch = async (url, timeoutMs) => {
    const response = await axios.get<unknown>(url, { timeout: timeoutMs });
    return response.data;
};

/**
 * Pulls the venue inventory and upserts venues and their surfaces into the
 * catalog. Favorites and captured streams are left alone.
 */
export class CatalogSync {
    constructor(
        private readonly catalog: CatalogService,
        private readonly url: string,
        private readonly timeoutMs: number,
        private readonly fetch: Fetch = getJson,
    ) { }

    async sync(): Promise<SyncResult> {
        logger.info(`Fetching venue catalog from ${this.url}`);
        const data = await this.fetch(this.url, this.timeoutMs);
        if (!Array.isArray(data))
            throw new Error('Venue catalog response is not a list');

        const now = new Date().toISOString();
        const result: SyncResult = { venues: 0, surfaces: 0, skipped: 0 };

        for (const entry of data) {
            const venueId = isObject(entry) ? integer(entry.id) : null;
            if (!isObject(entry) || venueId === null) {
                result.skipped++;
                continue;
            }

            this.catalog.upsertVenue({
                id: venueId,
                uuid: text(entry.uuid),
                name: text(entry.name),
                address: text(entry.address),
                city: text(entry.city),
                state: firstText(entry, STATE_KEYS),
                postalCode: firstText(entry, POSTAL_KEYS),
                country: text(entry.country),
                latitude: coordinate(entry.latitude),
                longitude: coordinate(entry.longitude),
                timeZone: text(entry.timeZone),
                updatedAt: now,
            });
            result.venues++;

            const surfaces = Array.isArray(entry.surfaces) ? entry.surfaces : [];
            for (const surface of surfaces) {
                const surfaceId = isObject(surface) ? integer(surface.id) : null;
                if (!isObject(surface) || surfaceId === null) {
                    result.skipped++;
                    continue;
                }
                this.catalog.upsertSurface({
                    id: surfaceId,
                    uuid: text(surface.uuid),
                    name: text(surface.name),
                    venueId,
                    updatedAt: now,
                });
                result.surfaces++;
            }
        }

        this.catalog.save();
        logger.info(`Catalog synced: ${result.venues} venues, ${result.surfaces} surfaces, ${result.skipped} skipped`);
        return result;
    }
}
