// src/core/runner.ts

import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import pluralize from 'pluralize';
import type {EndpointGenConfig, ResolvedEndpointGenConfig} from '../schema';
import {loadEndpointGenConfig, resolveConfig} from './config-loader';
import {collectSourceFiles} from './collect-files';
import {CacheManager} from './cache-manager';
import {transformSource} from './source-transform';
import type {GenerationError} from './errors';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {
    removeFileSafeSync,
    resolveProjectPath,
    toPosixPath,
    writeFileSafeSync,
} from '../util/fs-utils';

export interface RunOptions {
    /**
     * Optional explicit config file (absolute or relative to cwd).
     */
    configPath?: string;

    /**
     * Inline config; when given, no config file is loaded.
     */
    config?: EndpointGenConfig;

    /**
     * Optional logger override.
     */
    logger?: Logger;

    /**
     * Validate only: nothing is written and the cache is neither read nor saved.
     */
    check?: boolean;

    /**
     * Ignore the cache and regenerate every file.
     */
    force?: boolean;
}

export interface RunSummary {
    /** Source files scanned. */
    files: number;
    /** Output files written (or, in check mode, that would be written). */
    generated: number;
    /** Helpers generated across all files. */
    helpers: number;
    /** Files skipped because neither they nor the settings changed. */
    skipped: number;
    /** Stale outputs removed. */
    removed: number;
    errors: GenerationError[];
}

/**
 * Run generation once for the current working directory.
 *
 * Each annotated source file under the project root is transformed and
 * written to the same relative path under `outDir`. A file with any
 * generation error is not written; errors are collected in the summary.
 */
export async function runOnce(cwd: string, options: RunOptions = {}): Promise<RunSummary> {
    const logger = options.logger ?? defaultLogger.child('[runner]');

    let config: ResolvedEndpointGenConfig;
    let projectRoot: string;
    if (options.config) {
        config = resolveConfig(options.config);
        projectRoot = path.resolve(cwd, config.root);
    } else {
        ({config, projectRoot} = await loadEndpointGenConfig(cwd, {
            configPath: options.configPath,
        }));
    }

    const check = !!options.check;
    const outDirAbs = resolveProjectPath(projectRoot, config.outDir);
    const fingerprint = settingsFingerprint(config);

    const cache = new CacheManager(projectRoot, config.cacheFile);
    if (!check) cache.load();

    const files = collectSourceFiles(projectRoot, {
        include: config.include,
        exclude: config.exclude,
        skipDirs: [config.outDir],
    });

    logger.debug(`Scanning ${pluralize('file', files.length, true)} under ${projectRoot}`);

    const summary: RunSummary = {
        files: files.length,
        generated: 0,
        helpers: 0,
        skipped: 0,
        removed: 0,
        errors: [],
    };

    for (const rel of files) {
        const absPath = path.join(projectRoot, rel);
        const text = fs.readFileSync(absPath, 'utf8');
        const hash = sha1(fingerprint, text);

        const cached = cache.get(rel);
        if (
            !check &&
            !options.force &&
            cached?.hash === hash &&
            (!cached.output || fs.existsSync(path.join(projectRoot, cached.output)))
        ) {
            summary.skipped += 1;
            summary.helpers += cached.helpers;
            continue;
        }

        const result = transformSource(text, {
            fileName: rel,
            tag: config.tag,
            helperName: config.helperName,
            delimiters: config.delimiters,
            unusedSchema: config.unusedSchema,
            indentStep: config.indentStep,
        });

        for (const diag of result.diagnostics) {
            logger.warn(`${rel}:${diag.line}: [${diag.code ?? diag.severity}] ${diag.message}`);
        }

        if (result.errors.length) {
            for (const err of result.errors) logger.error(err.format());
            summary.errors.push(...result.errors);
            if (!check && cached) {
                // Output of an older version must not outlive the failure.
                if (cached.output) {
                    removeFileSafeSync(path.join(projectRoot, cached.output));
                    summary.removed += 1;
                }
                cache.set({
                    path: rel,
                    hash: '',
                    helpers: 0,
                    generatedAt: new Date().toISOString(),
                });
            }
            continue;
        }

        const outputRel = toPosixPath(path.join(config.outDir, rel));

        if (result.helpers.length === 0) {
            if (!check && cached?.output) {
                removeFileSafeSync(path.join(projectRoot, cached.output));
                summary.removed += 1;
            }
            if (!check) {
                cache.set({
                    path: rel,
                    hash,
                    helpers: 0,
                    generatedAt: new Date().toISOString(),
                });
            }
            continue;
        }

        summary.generated += 1;
        summary.helpers += result.helpers.length;

        for (const info of result.helpers) {
            logger.debug(
                `${rel}:${info.line}: ${info.functionName} -> ${info.helper.name}(${info.helper.parameter ? info.helper.parameter.type : ''})`,
            );
        }

        if (check) continue;

        const outputAbs = path.join(projectRoot, outputRel);
        if (path.resolve(outputAbs) === path.resolve(absPath)) {
            throw new Error(
                `Refusing to overwrite source ${rel}: outDir "${config.outDir}" maps it onto itself.`,
            );
        }
        writeFileSafeSync(outputAbs, result.output);
        cache.set({
            path: rel,
            hash,
            output: outputRel,
            helpers: result.helpers.length,
            generatedAt: new Date().toISOString(),
        });
    }

    if (!check) {
        summary.removed += pruneStaleOutputs(cache, new Set(files), projectRoot);
        cache.save();
    }

    const verb = check ? 'Checked' : 'Generated';
    logger.info(
        `${verb} ${pluralize('helper', summary.helpers, true)} across ${pluralize('file', summary.files, true)}` +
        ` (${summary.skipped} unchanged, ${pluralize('error', summary.errors.length, true)}) -> ${outDirAbs}`,
    );

    return summary;
}

/**
 * Drop outputs whose source file is gone (or no longer matched).
 */
function pruneStaleOutputs(
    cache: CacheManager,
    seen: ReadonlySet<string>,
    projectRoot: string,
): number {
    let removed = 0;
    for (const rel of cache.allPaths()) {
        if (seen.has(rel)) continue;
        const entry = cache.get(rel);
        if (entry?.output) {
            removeFileSafeSync(path.join(projectRoot, entry.output));
            removed += 1;
        }
        cache.delete(rel);
    }
    return removed;
}

function settingsFingerprint(config: ResolvedEndpointGenConfig): string {
    return JSON.stringify({
        tag: config.tag,
        helperName: config.helperName,
        delimiters: config.delimiters,
        unusedSchema: config.unusedSchema,
        indentStep: config.indentStep,
        outDir: config.outDir,
    });
}

function sha1(...parts: string[]): string {
    const hash = crypto.createHash('sha1');
    for (const part of parts) hash.update(part).update('\0');
    return hash.digest('hex');
}
