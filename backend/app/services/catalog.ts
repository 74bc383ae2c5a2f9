import fs from 'fs';
import path from 'path';
import { logger } from './logger.js';
import { NotFoundError, errorMessage } from './errors.js';

export interface Venue {
    id: number;
    uuid: string;
    name: string;
    address: string;
    city: string;
    state: string;
    postalCode: string;
    country: string;
    latitude: number | null;
    longitude: number | null;
    timeZone: string;
    updatedAt: string;
}

export interface Surface {
    id: number;
    uuid: string;
    name: string;
    venueId: number;
    updatedAt: string;
}

export interface Favorite {
    surfaceId: number;
    addedAt: string;
}

export interface StreamRecord {
    surfaceId: number;
    playlistUrl: string;
    capturedAt: string;
}

interface DBSchema {
    venues: Record<string, Venue>; // key is venue id
    surfaces: Record<string, Surface>; // key is surface id
    favorites: Record<string, Favorite>; // key is surface id
    streams: Record<string, StreamRecord>; // key is surface id
}

export interface VenueSummary {
    id: number;
    uuid: string;
    name: string;
    city: string;
    state: string;
    country: string;
    favoriteCount: number;
    isFavoriteVenue: boolean;
}

export interface SurfaceListing {
    id: number;
    uuid: string;
    name: string;
    venueId: number;
    isFavorite: boolean;
    playlistUrl: string | null;
}

export interface FavoriteListing {
    venueId: number;
    venueName: string;
    city: string;
    state: string;
    surfaceId: number;
    surfaceName: string;
    streamName: string;
    playlistUrl: string | null;
}

export interface SurfaceInfo {
    venueName: string;
    surfaceName: string;
}

export interface VenueQuery {
    search?: string;
    state?: string;
    limit?: number;
    offset?: number;
}

const emptyDb = (): DBSchema => ({
    venues: {},
    surfaces: {},
    favorites: {},
    streams: {},
});

const TABLES = ['venues', 'surfaces', 'favorites', 'streams'] as const;

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);

class Database {
    db: DBSchema = emptyDb();

    constructor(readonly file: string) { }

    read() {
        try {
            const data: unknown = JSON.parse(fs.readFileSync(this.file, 'utf-8'));
            if (!isObject(data))
                throw new Error('catalog root is not an object');
            const db = emptyDb();
            for (const table of TABLES) {
                const rows = data[table];
                if (isObject(rows))
                    Object.assign(db[table], rows);
            }
            this.db = db;
        } catch (error) {
            if (!isMissingFile(error))
                logger.warn(`Catalog at ${this.file} unreadable, starting empty: ${errorMessage(error)}`);
            this.db = emptyDb();
            this.save();
        }
        return this.db;
    }

    save() {
        fs.mkdirSync(path.dirname(this.file), { recursive: true });
        const temp = `${this.file}.tmp`;
        fs.writeFileSync(temp, JSON.stringify(this.db, null, 2), 'utf-8');
        fs.renameSync(temp, this.file);
    }
}

/**
 * Venues, surfaces, the user's favorites and the last captured stream URL
 * per surface, persisted as one JSON document.
 */
class CatalogService {
    database: Database;

    constructor(file: string) {
        this.database = new Database(file);
    }

    init() {
        this.database.read();
        logger.info(`Catalog loaded: ${this.venueCount} venues, ${Object.keys(this.db.surfaces).length} surfaces, ${Object.keys(this.db.favorites).length} favorites`);
    }

    get db() { return this.database.db; }

    get venueCount(): number {
        return Object.keys(this.db.venues).length;
    }

    save() {
        this.database.save();
    }

    upsertVenue(venue: Venue) {
        this.db.venues[String(venue.id)] = venue;
    }

    upsertSurface(surface: Surface) {
        this.db.surfaces[String(surface.id)] = surface;
    }

    listVenues(query: VenueQuery = {}): VenueSummary[] {
        const search = query.search?.trim().toLowerCase();
        const favoritesByVenue = new Map<number, number>();
        for (const favorite of Object.values(this.db.favorites)) {
            const surface = this.db.surfaces[String(favorite.surfaceId)];
            if (surface)
                favoritesByVenue.set(surface.venueId, (favoritesByVenue.get(surface.venueId) ?? 0) + 1);
        }

        let venues = Object.values(this.db.venues)
            .filter(venue => !search || venue.name.toLowerCase().includes(search) || venue.city.toLowerCase().includes(search))
            .filter(venue => !query.state || venue.state === query.state)
            .sort(byName);

        const offset = query.offset ?? 0;
        if (query.limit !== undefined)
            venues = venues.slice(offset, offset + query.limit);
        else if (offset > 0)
            venues = venues.slice(offset);

        return venues.map(venue => {
            const favoriteCount = favoritesByVenue.get(venue.id) ?? 0;
            return {
                id: venue.id,
                uuid: venue.uuid,
                name: venue.name,
                city: venue.city,
                state: venue.state,
                country: venue.country,
                favoriteCount,
                isFavoriteVenue: favoriteCount > 0,
            };
        });
    }

    listSurfaces(venueId: number): SurfaceListing[] {
        if (!this.db.venues[String(venueId)])
            throw new NotFoundError(`Venue ${venueId} not found`);
        return Object.values(this.db.surfaces)
            .filter(surface => surface.venueId === venueId)
            .sort(byName)
            .map(surface => ({
                id: surface.id,
                uuid: surface.uuid,
                name: surface.name,
                venueId: surface.venueId,
                isFavorite: String(surface.id) in this.db.favorites,
                playlistUrl: this.db.streams[String(surface.id)]?.playlistUrl ?? null,
            }));
    }

    listFavorites(): FavoriteListing[] {
        const favorites: FavoriteListing[] = [];
        for (const favorite of Object.values(this.db.favorites)) {
            const surface = this.db.surfaces[String(favorite.surfaceId)];
            if (!surface) continue;
            const venue = this.db.venues[String(surface.venueId)];
            if (!venue) continue;
            favorites.push({
                venueId: venue.id,
                venueName: venue.name,
                city: venue.city,
                state: venue.state,
                surfaceId: surface.id,
                surfaceName: surface.name,
                streamName: surface.uuid,
                playlistUrl: this.db.streams[String(surface.id)]?.playlistUrl ?? null,
            });
        }
        return favorites.sort((a, b) => a.venueName.localeCompare(b.venueName) || a.surfaceName.localeCompare(b.surfaceName));
    }

    toggleFavorite(surfaceId: number): 'added' | 'removed' {
        const key = String(surfaceId);
        if (this.db.favorites[key]) {
            delete this.db.favorites[key];
            this.save();
            logger.info(`Removed surface ${surfaceId} from favorites`);
            return 'removed';
        }
        if (!this.db.surfaces[key])
            throw new NotFoundError(`Surface ${surfaceId} not found`);
        this.db.favorites[key] = { surfaceId, addedAt: new Date().toISOString() };
        this.save();
        logger.info(`Added surface ${surfaceId} to favorites`);
        return 'added';
    }

    getSurfaceInfo(surfaceId: number): SurfaceInfo | null {
        const surface = this.db.surfaces[String(surfaceId)];
        if (!surface) return null;
        const venue = this.db.venues[String(surface.venueId)];
        return { venueName: venue?.name ?? 'Unknown Venue', surfaceName: surface.name };
    }

    getStream(surfaceId: number): StreamRecord | null {
        return this.db.streams[String(surfaceId)] ?? null;
    }

    saveStream(surfaceId: number, playlistUrl: string): StreamRecord {
        const record: StreamRecord = { surfaceId, playlistUrl, capturedAt: new Date().toISOString() };
        this.db.streams[String(surfaceId)] = record;
        this.save();
        return record;
    }
}

export { CatalogService };
