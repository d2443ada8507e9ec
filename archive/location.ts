/**
 * Daily Weather Archive — Geo-Distance Resolver
 *
 * Labels an arbitrary coordinate with the nearest reference site. The label never
 * changes which coordinate is queried.
 */

import { InvalidInputError } from './errors';
import type { Coordinate, NearestSiteResult, ReferenceSite } from './types';

export const EARTH_RADIUS_KM = 6371.0;

function toRad(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

export function isValidCoordinate(value: Coordinate): boolean {
    const { latitude, longitude } = value;
    return (
        Number.isFinite(latitude) &&
        Number.isFinite(longitude) &&
        latitude >= -90 &&
        latitude <= 90 &&
        longitude >= -180 &&
        longitude <= 180
    );
}

export function assertCoordinate(value: Coordinate): Coordinate {
    if (!Number.isFinite(value.latitude) || !Number.isFinite(value.longitude)) {
        throw new InvalidInputError('Invalid location: latitude/longitude must be finite numbers');
    }
    if (value.latitude < -90 || value.latitude > 90) {
        throw new InvalidInputError('Invalid location: latitude out of range');
    }
    if (value.longitude < -180 || value.longitude > 180) {
        throw new InvalidInputError('Invalid location: longitude out of range');
    }
    return { latitude: value.latitude, longitude: value.longitude };
}

/**
 * Great-circle distance (haversine) in kilometres.
 */
export function distanceKm(a: Coordinate, b: Coordinate): number {
    const dLat = toRad(b.latitude - a.latitude);
    const dLon = toRad(b.longitude - a.longitude);
    const h =
        Math.sin(dLat / 2) ** 2 +
        Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLon / 2) ** 2;
    const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
    return EARTH_RADIUS_KM * c;
}

/**
 * Closest catalog entry to `point`. On a tie the earlier entry wins.
 */
export function nearestSite(point: Coordinate, catalog: readonly ReferenceSite[]): NearestSiteResult {
    if (catalog.length === 0) {
        throw new InvalidInputError('Reference site catalog is empty');
    }

    let best = catalog[0];
    let bestDistance = distanceKm(point, best.coordinate);
    for (const site of catalog.slice(1)) {
        const d = distanceKm(point, site.coordinate);
        if (d < bestDistance) {
            best = site;
            bestDistance = d;
        }
    }
    return { site: best, distanceKm: bestDistance };
}

// =============================================================================
// Catalog
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a catalog read from JSON.
 *
 * Accepted entry shape: `{ "name": "Rennes", "latitude": 48.117, "longitude": -1.677 }`.
 */
export function parseSiteCatalog(raw: unknown): ReferenceSite[] {
    if (!Array.isArray(raw) || raw.length === 0) {
        throw new InvalidInputError('Site catalog must be a non-empty array');
    }

    const seen = new Set<string>();
    return raw.map((entry, index) => {
        if (!isRecord(entry)) {
            throw new InvalidInputError(`Site catalog entry ${index} is not an object`);
        }
        const name = typeof entry.name === 'string' ? entry.name.trim() : '';
        if (!name) {
            throw new InvalidInputError(`Site catalog entry ${index} has no name`);
        }
        if (seen.has(name)) {
            throw new InvalidInputError(`Duplicate site name in catalog: ${name}`);
        }
        seen.add(name);

        const coordinate = { latitude: Number(entry.latitude), longitude: Number(entry.longitude) };
        if (typeof entry.latitude !== 'number' || typeof entry.longitude !== 'number' || !isValidCoordinate(coordinate)) {
            throw new InvalidInputError(`Site ${name} has an invalid coordinate`);
        }
        return { name, coordinate };
    });
}
