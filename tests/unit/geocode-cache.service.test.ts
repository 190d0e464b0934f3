import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { GeocodeCache, withGeocodeCache } from '@/services/geocoding/geocode-cache.service';
import type { LocationRecord } from '@/shared/types/common.types';
import { logger } from '@/shared/utils/logger';

const paris: LocationRecord = {
    city: 'Paris',
    state: 'Île-de-France',
    country: 'France',
    displayName: 'Paris, Île-de-France, France métropolitaine, France',
};

const lyon: LocationRecord = {
    city: 'Lyon',
    state: 'Auvergne-Rhône-Alpes',
    country: 'France',
    displayName: 'Lyon, Auvergne-Rhône-Alpes, France',
};

describe('GeocodeCache', () => {
    let workDir: string;
    let cacheFile: string;

    beforeEach(async () => {
        workDir = await mkdtemp(join(tmpdir(), 'geocode-cache-'));
        cacheFile = join(workDir, 'geocode-cache.json');
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(workDir, { recursive: true, force: true });
    });

    describe('lookup', () => {
        it('should return a stored record for the identical coordinate', () => {
            const cache = new GeocodeCache();
            const coordinate = { latitude: 48.8566, longitude: 2.3522 };

            cache.store(coordinate, paris);

            expect(cache.lookup(coordinate)).toBe(paris);
            expect(cache.size).toBe(1);
        });

        it('should match a nearby coordinate within tolerance', () => {
            const cache = new GeocodeCache();
            cache.store({ latitude: 48.8566, longitude: 2.3522 }, paris);

            expect(cache.lookup({ latitude: 48.857, longitude: 2.3519 })).toBe(paris);
        });

        it('should not match coordinates 0.01 degrees or more apart', () => {
            const cache = new GeocodeCache();
            cache.store({ latitude: 45, longitude: 5 }, lyon);

            expect(cache.lookup({ latitude: 45.01, longitude: 5 })).toBeNull();
            expect(cache.lookup({ latitude: 45, longitude: 4.99 })).toBeNull();
            expect(cache.lookup({ latitude: 45.02, longitude: 5.02 })).toBeNull();
        });

        it('should miss a coordinate exactly 0.01 degrees away on one axis', () => {
            const cache = new GeocodeCache();
            cache.store({ latitude: 48.8566, longitude: 2.3522 }, paris);

            expect(cache.lookup({ latitude: 48.8666, longitude: 2.3522 })).toBeNull();
            expect(cache.lookup({ latitude: 48.8566, longitude: 2.3422 })).toBeNull();
        });

        it('should return the first tolerant match in insertion order', () => {
            const cache = new GeocodeCache();
            cache.store({ latitude: 45.004, longitude: 5 }, lyon);
            cache.store({ latitude: 45.001, longitude: 5 }, paris);

            expect(cache.lookup({ latitude: 45.0015, longitude: 5 })).toBe(lyon);
        });

        it('should prefer an exact key over an earlier nearby entry', () => {
            const cache = new GeocodeCache();
            cache.store({ latitude: 45.004, longitude: 5 }, lyon);
            cache.store({ latitude: 45.001, longitude: 5 }, paris);

            expect(cache.lookup({ latitude: 45.001, longitude: 5 })).toBe(paris);
        });

        it('should skip malformed keys during the proximity scan', () => {
            const entries: Array<[string, LocationRecord]> = [
                ['not-a-coordinate', lyon],
                ['45.000000', lyon],
                ['45,5', paris],
            ];
            const cache = new GeocodeCache(entries);

            expect(cache.lookup({ latitude: 45.003, longitude: 5.003 })).toBe(paris);
        });

        it('should overwrite an existing key silently', () => {
            const cache = new GeocodeCache();
            const coordinate = { latitude: 45.75, longitude: 4.85 };

            cache.store(coordinate, paris);
            cache.store(coordinate, lyon);

            expect(cache.lookup(coordinate)).toBe(lyon);
            expect(cache.size).toBe(1);
        });
    });

    describe('loadFrom', () => {
        it('should start empty when the file does not exist', async () => {
            const cache = await GeocodeCache.loadFrom(cacheFile);

            expect(cache.size).toBe(0);
        });

        it('should start empty and warn when the file is corrupt', async () => {
            const warn = vi.spyOn(logger, 'warn');
            await writeFile(cacheFile, '{ "48.8566,2.3522": ', 'utf-8');

            const cache = await GeocodeCache.loadFrom(cacheFile);

            expect(cache.size).toBe(0);
            expect(warn).toHaveBeenCalledTimes(1);
            expect(warn.mock.calls[0]?.[0]).toMatchObject({ event: 'geocode.cache.load.failed', filePath: cacheFile });
        });

        it('should start empty when the document has an unexpected shape', async () => {
            const warn = vi.spyOn(logger, 'warn');
            await writeFile(cacheFile, JSON.stringify(['48.8566,2.3522']), 'utf-8');

            const cache = await GeocodeCache.loadFrom(cacheFile);

            expect(cache.size).toBe(0);
            expect(warn).toHaveBeenCalledTimes(1);
        });

        it('should start empty when the path cannot be read as a file', async () => {
            await mkdir(cacheFile);

            const cache = await GeocodeCache.loadFrom(cacheFile);

            expect(cache.size).toBe(0);
        });

        it('should read snake_case entries and fill absent fields with null', async () => {
            await writeFile(cacheFile, JSON.stringify({
                '48.8566,2.3522': {
                    city: 'Paris',
                    state: null,
                    country: 'France',
                    display_name: 'Paris, France',
                },
                '45.75,4.85': { city: 'Lyon' },
            }), 'utf-8');

            const cache = await GeocodeCache.loadFrom(cacheFile);

            expect(cache.size).toBe(2);
            expect(cache.lookup({ latitude: 48.8566, longitude: 2.3522 })).toEqual({
                city: 'Paris',
                state: null,
                country: 'France',
                displayName: 'Paris, France',
            });
            expect(cache.lookup({ latitude: 45.75, longitude: 4.85 })).toEqual({
                city: 'Lyon',
                state: null,
                country: null,
                displayName: null,
            });
        });
    });

    describe('persistTo', () => {
        it('should write the whole cache as a keyed JSON document', async () => {
            const cache = new GeocodeCache();
            cache.store({ latitude: 48.85661234, longitude: 2.3522 }, paris);

            const written = await cache.persistTo(cacheFile);

            expect(written).toBe(true);
            const document: unknown = JSON.parse(await readFile(cacheFile, 'utf-8'));
            expect(document).toEqual({
                '48.856612,2.3522': {
                    city: 'Paris',
                    state: 'Île-de-France',
                    country: 'France',
                    display_name: 'Paris, Île-de-France, France métropolitaine, France',
                },
            });
        });

        it('should create missing parent directories', async () => {
            const nestedFile = join(workDir, 'nested', 'deeper', 'cache.json');
            const cache = new GeocodeCache();
            cache.store({ latitude: 45.75, longitude: 4.85 }, lyon);

            expect(await cache.persistTo(nestedFile)).toBe(true);

            const reloaded = await GeocodeCache.loadFrom(nestedFile);
            expect(reloaded.lookup({ latitude: 45.75, longitude: 4.85 })).toEqual(lyon);
        });

        it('should report a write failure without losing in-memory entries', async () => {
            const error = vi.spyOn(logger, 'error');
            const blocker = join(workDir, 'blocker');
            await writeFile(blocker, 'not a directory', 'utf-8');
            const cache = new GeocodeCache();
            cache.store({ latitude: 45.75, longitude: 4.85 }, lyon);

            const written = await cache.persistTo(join(blocker, 'cache.json'));

            expect(written).toBe(false);
            expect(error).toHaveBeenCalledTimes(1);
            expect(cache.lookup({ latitude: 45.75, longitude: 4.85 })).toBe(lyon);
        });

        it('should remove the temporary file when the final rename fails', async () => {
            const error = vi.spyOn(logger, 'error');
            const occupied = join(workDir, 'occupied');
            await mkdir(join(occupied, 'child'), { recursive: true });
            const cache = new GeocodeCache();
            cache.store({ latitude: 45.75, longitude: 4.85 }, lyon);

            const written = await cache.persistTo(occupied);

            expect(written).toBe(false);
            expect(error).toHaveBeenCalledTimes(1);
            expect(await readdir(workDir)).toEqual(['occupied']);
        });
    });

    describe('withGeocodeCache', () => {
        it('should load, run and persist the cache', async () => {
            await withGeocodeCache(cacheFile, async (cache) => {
                cache.store({ latitude: 45.75, longitude: 4.85 }, lyon);
            });

            const count = await withGeocodeCache(cacheFile, async (cache) => cache.size);

            expect(count).toBe(1);
        });

        it('should persist entries when the callback throws', async () => {
            await expect(withGeocodeCache(cacheFile, async (cache) => {
                cache.store({ latitude: 48.8566, longitude: 2.3522 }, paris);
                throw new Error('scan aborted');
            })).rejects.toThrow('scan aborted');

            const reloaded = await GeocodeCache.loadFrom(cacheFile);
            expect(reloaded.lookup({ latitude: 48.8566, longitude: 2.3522 })).toEqual(paris);
        });
    });
});
