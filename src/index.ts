// src/index.ts

export * from './schema';
export * from './ast';

export {GenerationError, isGenerationError} from './core/errors';
export type {
    Diagnostic,
    DiagnosticSeverity,
    GenerationErrorCode,
    GenerationErrorDetails,
} from './core/errors';

export {
    createSchemaRegistry,
    resolveSchema,
    buildFieldMap,
    type SchemaRegistry,
} from './core/schema-resolver';
export {bindTemplate, type BindOptions, type BindResult} from './core/binder';
export {
    renderHelper,
    renderExpression,
    renderPath,
    compilePath,
    HELPER_PARAM_NAME,
    type RenderOptions,
    type CompilePathOptions,
    type PathRenderer,
} from './core/renderer';
export {
    generate,
    checkSignature,
    type GenerateOptions,
    type GenerationResult,
} from './core/generate';
export {
    transformSource,
    collectSchemaDeclarations,
    type TransformOptions,
    type FileTransformResult,
    type GeneratedHelperInfo,
} from './core/source-transform';

export {
    loadEndpointGenConfig,
    resolveConfig,
    DEFAULT_EXCLUDE,
    type LoadConfigOptions,
    type LoadConfigResult,
} from './core/config-loader';
export {runOnce, type RunOptions, type RunSummary} from './core/runner';
export {watchEndpoints, type WatchOptions, type EndpointWatcher} from './core/watcher';
export {initConfig, type InitConfigOptions} from './core/init-config';

export {Logger, defaultLogger, type LogLevel, type LoggerOptions} from './util/logger';
