// src/core/init-config.ts

import fs from 'fs';
import path from 'path';
import {defaultLogger} from '../util/logger';
import {CONFIG_FILE_CANDIDATES} from '../schema';

const logger = defaultLogger.child('[init]');

export interface InitConfigOptions {
    /**
     * Overwrite an existing config file.
     */
    force?: boolean;

    /**
     * Config file name, relative to cwd.
     * Default: "endpointgen.config.ts"
     */
    configFileName?: string;
}

const DEFAULT_CONFIG_TS = `import type { EndpointGenConfig } from 'endpointgen';

const config: EndpointGenConfig = {
  // Project root, relative to this directory.
  // root: '.',

  // Files scanned for annotated functions, relative to root.
  include: ['src/**/*.ts'],
  // exclude: ['**/*.d.ts', '**/*.test.ts'],

  // Transformed copies are written here, mirroring source paths.
  outDir: 'generated',

  // Placeholder delimiters, one character each. Templates cannot contain
  // them as literal text.
  // delimiters: { open: '{', close: '}' },

  // 'error' (default) fails when \`params=\` is given for a template
  // without placeholders; 'warn' only reports it.
  // unusedSchema: 'error',

  // Helper name when the annotation has no \`name=\`.
  // helperName: 'endpoint',

  // JSDoc tag marking annotated functions:
  //   /** @endpoint "/customers/{customer_id}" params=PathParameters */
  // tag: 'endpoint',

  // indentStep: 4,
  // cacheFile: '.endpointgen-cache.json',
};

export default config;
`;

/**
 * Write a starter config into cwd unless one exists (or force is set).
 */
export async function initConfig(
    cwd: string,
    options: InitConfigOptions = {},
): Promise<{configPath: string; created: boolean}> {
    const configFileName = options.configFileName ?? CONFIG_FILE_CANDIDATES[0];
    const configPath = path.resolve(cwd, configFileName);
    const existed = fs.existsSync(configPath);

    if (existed && !options.force) {
        logger.info(`Config already exists at ${configPath} (use --force to overwrite).`);
        return {configPath, created: false};
    }

    await fs.promises.writeFile(configPath, DEFAULT_CONFIG_TS, 'utf8');
    logger.info(`${existed ? 'Overwrote' : 'Created'} config at ${configPath}`);

    return {configPath, created: true};
}
