// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

export function toPosixPath(p: string): string {
    return p.replace(/\\/g, '/');
}

/**
 * mkdir -p. Returns dirPath.
 */
export function ensureDirSync(dirPath: string): string {
    fs.mkdirSync(dirPath, { recursive: true });
    return dirPath;
}

/**
 * Write a UTF-8 file, creating parent directories if needed.
 */
export function writeFileSafeSync(filePath: string, contents: string): void {
    ensureDirSync(path.dirname(filePath));
    fs.writeFileSync(filePath, contents, 'utf8');
}

/**
 * Remove a file; a file that is already gone is not an error.
 */
export function removeFileSafeSync(filePath: string): void {
    fs.rmSync(filePath, { force: true });
}

/**
 * Resolve projectRoot + relPath to an absolute path.
 * Throws if the result escapes the project root (e.g. outDir: "../x").
 */
export function resolveProjectPath(projectRoot: string, relPath: string): string {
    const absRoot = path.resolve(projectRoot);
    const absTarget = path.resolve(absRoot, relPath);

    const rel = path.relative(absRoot, absTarget);
    if (rel.startsWith('..') || path.isAbsolute(rel)) {
        throw new Error(
            `"${relPath}" resolves outside the project root ` +
            `(root="${absRoot}", target="${absTarget}").`,
        );
    }

    return absTarget;
}
