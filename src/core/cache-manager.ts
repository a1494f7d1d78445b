// src/core/cache-manager.ts

import fs from 'fs';
import path from 'path';
import {ensureDirSync, toPosixPath} from '../util/fs-utils';
import {defaultLogger} from '../util/logger';

const logger = defaultLogger.child('[cache]');

export interface CacheEntry {
    /**
     * Source path relative to the project root, POSIX style.
     */
    path: string;

    /**
     * sha1 of source text + generation settings.
     */
    hash: string;

    /**
     * Output path relative to the project root; absent when the source had
     * no annotations and nothing was written.
     */
    output?: string;

    helpers: number;
    generatedAt: string;
}

export interface CacheFile {
    version: 1;
    entries: Record<string, CacheEntry>;
}

function emptyCache(): CacheFile {
    return {version: 1, entries: {}};
}

function isCacheFile(value: unknown): value is CacheFile {
    return (
        typeof value === 'object' &&
        value !== null &&
        'version' in value &&
        value.version === 1 &&
        'entries' in value &&
        typeof value.entries === 'object' &&
        value.entries !== null
    );
}

export class CacheManager {
    private cache: CacheFile = emptyCache();

    constructor(
        private readonly projectRoot: string,
        private readonly cacheFileRelPath: string,
    ) {}

    private get cachePathAbs(): string {
        return path.resolve(this.projectRoot, this.cacheFileRelPath);
    }

    load(): void {
        const cachePath = this.cachePathAbs;
        if (!fs.existsSync(cachePath)) {
            this.cache = emptyCache();
            return;
        }

        try {
            const parsed: unknown = JSON.parse(fs.readFileSync(cachePath, 'utf8'));
            if (isCacheFile(parsed)) {
                this.cache = parsed;
            } else {
                logger.warn('Cache file version mismatch or invalid, resetting cache.');
                this.cache = emptyCache();
            }
        } catch (err) {
            logger.warn('Failed to read cache file, resetting cache.', err);
            this.cache = emptyCache();
        }
    }

    save(): void {
        const cachePath = this.cachePathAbs;
        ensureDirSync(path.dirname(cachePath));
        fs.writeFileSync(cachePath, JSON.stringify(this.cache, null, 2), 'utf8');
    }

    get(relPath: string): CacheEntry | undefined {
        return this.cache.entries[toPosixPath(relPath)];
    }

    set(entry: CacheEntry): void {
        const key = toPosixPath(entry.path);
        this.cache.entries[key] = {...entry, path: key};
    }

    delete(relPath: string): void {
        delete this.cache.entries[toPosixPath(relPath)];
    }

    allPaths(): string[] {
        return Object.keys(this.cache.entries);
    }
}
