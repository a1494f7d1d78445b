// src/core/collect-files.ts

import fs from 'fs';
import path from 'path';
import {minimatch} from 'minimatch';
import {toPosixPath} from '../util/fs-utils';

export interface CollectFilesOptions {
    include: readonly string[];
    exclude: readonly string[];
    /**
     * Directories (relative to root) never descended into, e.g. outDir.
     */
    skipDirs?: readonly string[];
}

/**
 * Walk rootDir and return POSIX paths (relative to rootDir) of every file
 * matching at least one include pattern and no exclude pattern, sorted.
 */
export function collectSourceFiles(
    rootDir: string,
    options: CollectFilesOptions,
): string[] {
    const absRoot = path.resolve(rootDir);
    const skipDirs = (options.skipDirs ?? []).map((d) =>
        toPosixPath(path.normalize(d)).replace(/\/+$/, ''),
    );
    const files: string[] = [];

    const isExcluded = (rel: string) =>
        options.exclude.some((pattern) => minimatch(rel, pattern, {dot: true}));

    const isIncluded = (rel: string) =>
        options.include.some((pattern) => minimatch(rel, pattern, {dot: true}));

    function walk(currentAbs: string) {
        let dirents: fs.Dirent[];
        try {
            dirents = fs.readdirSync(currentAbs, {withFileTypes: true});
        } catch {
            return;
        }

        for (const dirent of dirents) {
            const absPath = path.join(currentAbs, dirent.name);
            const rel = toPosixPath(path.relative(absRoot, absPath));

            if (dirent.isDirectory()) {
                if (skipDirs.includes(rel)) continue;
                if (isExcluded(rel) || isExcluded(`${rel}/`)) continue;
                walk(absPath);
            } else if (dirent.isFile()) {
                if (isIncluded(rel) && !isExcluded(rel)) files.push(rel);
            }
        }
    }

    walk(absRoot);
    return files.sort();
}
