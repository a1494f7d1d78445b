// src/schema/config.ts

import type {Delimiters} from './template';

/**
 * What to do when an annotation names a `params` type but the template
 * has no placeholders.
 * - 'error' (default): fail generation with `UnusedSchema`.
 * - 'warn': report a warning; the helper takes no parameter.
 */
export type UnusedSchemaPolicy = 'error' | 'warn';

/**
 * Root configuration object for endpointgen.
 *
 * This is what you export from `endpointgen.config.ts` in a consuming
 * project, or pass to `runOnce` when using the library programmatically.
 */
export interface EndpointGenConfig {
    /**
     * Project root, relative to the current working directory.
     * All globs, `outDir` and `cacheFile` are resolved against it.
     *
     * Default: "."
     */
    root?: string;

    /**
     * Glob patterns (relative to root) of source files to scan.
     *
     * Default: ["src/**\/*.ts"]
     */
    include?: string[];

    /**
     * Glob patterns (relative to root) of files to skip.
     * `outDir` is always skipped, whatever this says.
     */
    exclude?: string[];

    /**
     * Directory (relative to root) receiving the transformed copies of
     * annotated files. Paths below it mirror the source layout.
     *
     * Default: "generated"
     */
    outDir?: string;

    /**
     * Placeholder delimiters, one character each.
     *
     * Default: { open: "{", close: "}" }
     */
    delimiters?: Delimiters;

    unusedSchema?: UnusedSchemaPolicy;

    /**
     * Name of the generated helper when the annotation has no `name=`.
     *
     * Default: "endpoint"
     */
    helperName?: string;

    /**
     * JSDoc tag that marks an annotated function (without the "@").
     *
     * Default: "endpoint"
     */
    tag?: string;

    /**
     * Spaces per indent level used for inserted helpers.
     * Default: 4.
     */
    indentStep?: number;

    /**
     * Path to the generation cache file, relative to `root`.
     *
     * Default: ".endpointgen-cache.json"
     */
    cacheFile?: string;

    /**
     * Hint for the CLI to start in watch mode. Does not start watching by itself.
     */
    watch?: boolean;
}

/**
 * Config with every default applied.
 */
export type ResolvedEndpointGenConfig = Required<EndpointGenConfig>;
