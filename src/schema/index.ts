// src/schema/index.ts

export * from './template';
export * from './config';

/**
 * Config file names looked up in the working directory, in order.
 */
export const CONFIG_FILE_CANDIDATES = [
    'endpointgen.config.ts',
    'endpointgen.config.mts',
    'endpointgen.config.mjs',
    'endpointgen.config.js',
    'endpointgen.config.cjs',
] as const;

export const DEFAULT_DELIMITERS = {open: '{', close: '}'} as const;

export const DEFAULT_HELPER_NAME = 'endpoint';

export const DEFAULT_CACHE_FILE = '.endpointgen-cache.json';
