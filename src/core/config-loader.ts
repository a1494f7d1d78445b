// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import {pathToFileURL} from 'url';
import {transform} from 'esbuild';
import {z} from 'zod';

import {
    CONFIG_FILE_CANDIDATES,
    DEFAULT_CACHE_FILE,
    DEFAULT_DELIMITERS,
    DEFAULT_HELPER_NAME,
    type EndpointGenConfig,
    type ResolvedEndpointGenConfig,
} from '../schema';
import {assertValidDelimiters} from '../ast/parser';
import {defaultLogger} from '../util/logger';
import {ensureDirSync, toPosixPath} from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

export const DEFAULT_EXCLUDE: string[] = [
    '**/*.d.ts',
    'node_modules/**',
    '.git/**',
    'dist/**',
    'build/**',
    'coverage/**',
];

function isProjectRoot(dir: string): boolean {
    const normalized = path.posix.normalize(toPosixPath(dir)).replace(/\/+$/, '');
    return normalized === '' || normalized === '.';
}

const identifier = z.string().regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be an identifier');

const configSchema = z
    .object({
        root: z.string().optional(),
        include: z.array(z.string()).optional(),
        exclude: z.array(z.string()).optional(),
        outDir: z
            .string()
            .min(1)
            .refine((dir) => !isProjectRoot(dir), 'must not be the project root')
            .optional(),
        delimiters: z
            .object({
                open: z.string().length(1),
                close: z.string().length(1),
            })
            .refine((d) => d.open !== d.close, 'open and close delimiters must differ')
            .optional(),
        unusedSchema: z.enum(['error', 'warn']).optional(),
        helperName: identifier.optional(),
        tag: z.string().regex(/^[A-Za-z][\w-]*$/, 'must be a JSDoc tag name').optional(),
        indentStep: z.number().int().min(0).max(16).optional(),
        cacheFile: z.string().min(1).optional(),
        watch: z.boolean().optional(),
    })
    .strict();

export interface LoadConfigOptions {
    /**
     * Optional explicit config file path (absolute or relative to cwd).
     * If not provided, we look for endpointgen.config.* in cwd.
     */
    configPath?: string;
}

export interface LoadConfigResult {
    config: ResolvedEndpointGenConfig;

    /**
     * Absolute config file path, undefined when running on defaults.
     */
    configPath: string | undefined;

    /**
     * Absolute project root (cwd + config.root).
     */
    projectRoot: string;
}

/**
 * Validate a raw config value and apply defaults.
 * Throws with every problem listed when the shape is wrong.
 */
export function resolveConfig(raw: unknown, source = 'config'): ResolvedEndpointGenConfig {
    const parsed = configSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('\n');
        throw new Error(`Invalid endpointgen ${source}:\n${problems}`);
    }

    const config: EndpointGenConfig = parsed.data;
    const delimiters = config.delimiters ?? {...DEFAULT_DELIMITERS};
    assertValidDelimiters(delimiters);

    return {
        root: config.root ?? '.',
        include: config.include ?? ['src/**/*.ts'],
        exclude: config.exclude ?? DEFAULT_EXCLUDE,
        outDir: config.outDir ?? 'generated',
        delimiters,
        unusedSchema: config.unusedSchema ?? 'error',
        helperName: config.helperName ?? DEFAULT_HELPER_NAME,
        tag: config.tag ?? 'endpoint',
        indentStep: config.indentStep ?? 4,
        cacheFile: config.cacheFile ?? DEFAULT_CACHE_FILE,
        watch: config.watch ?? false,
    };
}

/**
 * Load endpointgen configuration for a working directory.
 *
 * Resolution rules:
 * - options.configPath given → that file must exist.
 * - Else the first endpointgen.config.* found in cwd.
 * - Else built-in defaults.
 * - projectRoot = cwd + config.root.
 */
export async function loadEndpointGenConfig(
    cwd: string,
    options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
    const absCwd = path.resolve(cwd);

    let configPath: string | undefined;
    if (options.configPath) {
        configPath = path.resolve(absCwd, options.configPath);
        if (!fs.existsSync(configPath)) {
            throw new Error(`Config file not found: ${configPath}`);
        }
    } else {
        configPath = findConfigPath(absCwd);
    }

    let config: ResolvedEndpointGenConfig;
    if (configPath) {
        const raw = await importConfig(configPath);
        config = resolveConfig(raw, `config (${configPath})`);
    } else {
        logger.debug(
            `No config found in ${absCwd} (looked for ${CONFIG_FILE_CANDIDATES.join(', ')}); using defaults.`,
        );
        config = resolveConfig({});
    }

    const projectRoot = path.resolve(absCwd, config.root);

    logger.debug(
        `Loaded config: configPath=${configPath ?? 'defaults'}, projectRoot=${projectRoot}, outDir=${config.outDir}`,
    );

    return {config, configPath, projectRoot};
}

export function findConfigPath(dir: string): string | undefined {
    for (const file of CONFIG_FILE_CANDIDATES) {
        const full = path.join(dir, file);
        if (fs.existsSync(full)) {
            return full;
        }
    }
    return undefined;
}

/**
 * Import a config module from the given path.
 * - For .ts/.mts we transpile with esbuild to ESM and load from a temp file.
 * - For .js/.mjs/.cjs we import directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
    const ext = path.extname(configPath).toLowerCase();

    const target =
        ext === '.ts' || ext === '.mts'
            ? await transpileTsConfig(configPath)
            : configPath;

    const mod: unknown = await import(pathToFileURL(target).href);
    return defaultExportOf(mod);
}

function defaultExportOf(mod: unknown): unknown {
    if (typeof mod === 'object' && mod !== null && 'default' in mod) {
        return mod.default;
    }
    return mod;
}

/**
 * Transpile a TS config file to ESM with esbuild and return the compiled
 * file path. Cached on (path + mtime) so edits invalidate the temp file.
 */
async function transpileTsConfig(configPath: string): Promise<string> {
    const source = fs.readFileSync(configPath, 'utf8');
    const stat = fs.statSync(configPath);

    const hash = crypto
        .createHash('sha1')
        .update(configPath)
        .update(String(stat.mtimeMs))
        .digest('hex');

    const tmpDir = ensureDirSync(path.join(os.tmpdir(), 'endpointgen-config'));
    const tmpFile = path.join(tmpDir, `${hash}.mjs`);

    if (!fs.existsSync(tmpFile)) {
        const result = await transform(source, {
            loader: 'ts',
            format: 'esm',
            sourcemap: 'inline',
            target: 'node20',
        });

        fs.writeFileSync(tmpFile, result.code, 'utf8');
    }

    return tmpFile;
}
