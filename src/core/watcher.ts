// src/core/watcher.ts

import path from 'path';
import chokidar from 'chokidar';
import {minimatch} from 'minimatch';
import {runOnce, type RunOptions} from './runner';
import {loadEndpointGenConfig, resolveConfig} from './config-loader';
import {defaultLogger} from '../util/logger';
import {toPosixPath} from '../util/fs-utils';
import type {ResolvedEndpointGenConfig} from '../schema';

export interface WatchOptions extends RunOptions {
    /**
     * Debounce delay in milliseconds between detected changes
     * and a re-run.
     *
     * Default: 150 ms
     */
    debounceMs?: number;
}

export interface EndpointWatcher {
    close(): Promise<void>;
}

/**
 * Watch the project root and re-run generation on changes to matching
 * source files or the config file.
 *
 * Config edits take effect on the next run, but the watched root and
 * globs are fixed at start.
 */
export async function watchEndpoints(
    cwd: string,
    options: WatchOptions = {},
): Promise<EndpointWatcher> {
    const logger = options.logger ?? defaultLogger.child('[watch]');
    const debounceMs = options.debounceMs ?? 150;

    let config: ResolvedEndpointGenConfig;
    let projectRoot: string;
    let configPath: string | undefined;
    if (options.config) {
        config = resolveConfig(options.config);
        projectRoot = path.resolve(cwd, config.root);
    } else {
        ({config, projectRoot, configPath} = await loadEndpointGenConfig(cwd, {
            configPath: options.configPath,
        }));
    }

    logger.info(`Watching ${projectRoot}`);

    let timer: NodeJS.Timeout | undefined;
    let running = false;
    let pending = false;

    async function run() {
        if (running) {
            pending = true;
            return;
        }
        running = true;
        try {
            logger.info('Change detected → generating...');
            // cache stays on: only changed files are re-generated
            const summary = await runOnce(cwd, {...options, force: false});
            if (summary.errors.length) {
                logger.warn(`Run finished with ${summary.errors.length} error(s).`);
            }
        } catch (err) {
            logger.error('Generation failed:', err);
        } finally {
            running = false;
            if (pending) {
                pending = false;
                scheduleRun();
            }
        }
    }

    function scheduleRun() {
        if (timer) clearTimeout(timer);
        timer = setTimeout(() => {
            void run();
        }, debounceMs);
    }

    const outDirRel = toPosixPath(path.normalize(config.outDir)).replace(/\/+$/, '');

    function isInteresting(filePath: string): boolean {
        const abs = path.resolve(filePath);
        if (configPath && abs === configPath) return true;

        const rel = toPosixPath(path.relative(projectRoot, abs));
        if (rel.startsWith('..')) return false;
        if (rel === outDirRel || rel.startsWith(`${outDirRel}/`)) return false;

        return (
            config.include.some((p) => minimatch(rel, p, {dot: true})) &&
            !config.exclude.some((p) => minimatch(rel, p, {dot: true}))
        );
    }

    const watched = configPath ? [projectRoot, configPath] : [projectRoot];
    const watcher = chokidar.watch(watched, {
        ignoreInitial: true,
        persistent: true,
        ignored: (p: string) => /(^|[\/\\])(node_modules|\.git)([\/\\]|$)/.test(p),
    });

    watcher
        .on('all', (event, filePath) => {
            if (!isInteresting(filePath)) return;
            logger.debug(`Event ${event} on ${filePath}`);
            scheduleRun();
        })
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    // Initial run
    scheduleRun();

    return {
        async close() {
            if (timer) clearTimeout(timer);
            await watcher.close();
        },
    };
}
