import type { LocationRecord, UniqueLocation } from '@/shared/types/common.types';

type MaybeLocation = Pick<LocationRecord, 'city' | 'state' | 'country'> | null | undefined;

/**
 * Compare two optional names; absent values sort after present ones
 */
function compareOptional(a: string | null, b: string | null): number {
    if (a === b) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return a < b ? -1 : 1;
}

function compareLocations(a: UniqueLocation, b: UniqueLocation): number {
    return compareOptional(a.country, b.country)
        || compareOptional(a.state, b.state)
        || compareOptional(a.city, b.city);
}

/**
 * Build the deduplicated list of visited places
 *
 * Records without a city are dropped, duplicates of the same
 * (city, state, country) triple are merged, and the result is ordered by
 * country, then state, then city.
 */
export function aggregateLocations(records: Iterable<MaybeLocation>): UniqueLocation[] {
    const unique = new Map<string, UniqueLocation>();

    for (const record of records) {
        if (!record?.city) continue;

        const location: UniqueLocation = {
            city: record.city,
            state: record.state ?? null,
            country: record.country ?? null,
        };
        const key = JSON.stringify([location.city, location.state, location.country]);
        if (!unique.has(key)) {
            unique.set(key, location);
        }
    }

    return [...unique.values()].sort(compareLocations);
}

/**
 * Count photos per city, most photographed first
 */
export function countPhotosByCity(records: Iterable<MaybeLocation>): Array<{ city: string; photos: number }> {
    const counts = new Map<string, number>();
    for (const record of records) {
        if (!record?.city) continue;
        counts.set(record.city, (counts.get(record.city) ?? 0) + 1);
    }

    return [...counts.entries()]
        .map(([city, photos]) => ({ city, photos }))
        .sort((a, b) => b.photos - a.photos || compareOptional(a.city, b.city));
}

/**
 * Format a location as "City, State, Country", skipping absent parts
 */
export function formatLocation(location: UniqueLocation): string {
    return [location.city, location.state, location.country]
        .filter((part): part is string => Boolean(part))
        .join(', ');
}
