import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { extname, join } from 'path';
import type { ExifReader } from './adapters/exif/exif.interface';
import type { ScannedPhoto } from '@/shared/types/common.types';
import { logger } from '@/shared/utils/logger';

/**
 * Image extensions scanned for GPS metadata
 */
export const SUPPORTED_EXTENSIONS = ['.jpg', '.jpeg', '.tif', '.tiff', '.png', '.heic'] as const;

/**
 * Photo Scan Error
 */
export class PhotoScanError extends Error {
    constructor(
        message: string,
        public readonly directory: string,
        cause?: Error
    ) {
        super(message, { cause });
        this.name = 'PhotoScanError';
    }
}

export function isSupportedImage(fileName: string): boolean {
    const extension = extname(fileName).toLowerCase();
    return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * Photo Scanner
 *
 * Walks a directory tree and reads the GPS tags of every supported image.
 * Entries are visited in name order so repeated runs see photos in the same order.
 */
export class PhotoScanner {
    constructor(private exifReader: ExifReader) { }

    /**
     * Yield every supported image below `directory` with its raw GPS tags
     *
     * @throws {PhotoScanError} If the root directory cannot be read
     */
    async *scan(directory: string): AsyncGenerator<ScannedPhoto> {
        let found = 0;
        for await (const path of this.walk(directory, true)) {
            found += 1;
            yield { path, gpsTags: await this.readTags(path) };
        }

        logger.info({
            event: 'scan.completed',
            directory,
            photos: found,
        }, `Found ${found} photos`);
    }

    private async *walk(directory: string, isRoot: boolean): AsyncGenerator<string> {
        let entries: Dirent[];
        try {
            entries = await readdir(directory, { withFileTypes: true });
        } catch (error) {
            if (isRoot) {
                throw new PhotoScanError(
                    `Cannot read photo directory ${directory}`,
                    directory,
                    error instanceof Error ? error : undefined
                );
            }
            logger.warn({
                event: 'scan.directory.failed',
                directory,
                error: error instanceof Error ? error.message : String(error),
            }, 'Skipping unreadable directory');
            return;
        }

        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const entry of entries) {
            const fullPath = join(directory, entry.name);
            if (entry.isDirectory()) {
                yield* this.walk(fullPath, false);
            } else if (entry.isFile() && isSupportedImage(entry.name)) {
                yield fullPath;
            }
        }
    }

    private async readTags(path: string): Promise<ScannedPhoto['gpsTags']> {
        try {
            return await this.exifReader.readGpsTags(path);
        } catch (error) {
            logger.warn({
                event: 'scan.exif.failed',
                photoPath: path,
                error: error instanceof Error ? error.message : String(error),
            }, 'Failed to read photo metadata');
            return null;
        }
    }
}
