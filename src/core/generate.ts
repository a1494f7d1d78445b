// src/core/generate.ts

import type {
    DeclaredParam,
    Delimiters,
    GeneratedFunction,
    ParameterSchema,
    UnusedSchemaPolicy,
} from '../schema';
import {parseTemplate} from '../ast/parser';
import {resolveSchema, type SchemaRegistry} from './schema-resolver';
import {bindTemplate} from './binder';
import {renderHelper} from './renderer';
import {GenerationError, type Diagnostic} from './errors';

export interface GenerateOptions {
    /** Parameter types in scope for `params`. */
    registry?: SchemaRegistry;
    delimiters?: Delimiters;
    unusedSchema?: UnusedSchemaPolicy;
    /** Default: "endpoint". */
    helperName?: string;
    /** Default: 4. */
    indentStep?: number;
}

export interface GenerationResult {
    helper: GeneratedFunction;
    /** Helper declaration source (same as helper.source). */
    code: string;
    /** Schema the helper takes, if any. */
    schema: ParameterSchema | undefined;
    diagnostics: Diagnostic[];
}

/**
 * Generation entry point: template + optional parameter type name +
 * the annotated function's declared parameters -> helper source.
 *
 * Throws GenerationError on the first fatal problem; nothing is produced
 * in that case.
 */
export function generate(
    templateArg: string,
    paramsArg: string | undefined,
    functionParams: readonly DeclaredParam[],
    opts: GenerateOptions = {},
): GenerationResult {
    const template = parseTemplate(templateArg, {delimiters: opts.delimiters});

    const declared =
        paramsArg !== undefined
            ? resolveSchema(paramsArg, opts.registry ?? new Map())
            : undefined;

    const {bound, schema, diagnostics} = bindTemplate(template, declared, {
        unusedSchema: opts.unusedSchema,
    });

    checkSignature(functionParams, paramsArg);

    const helper = renderHelper(bound, {
        name: opts.helperName,
        schema,
        indentStep: opts.indentStep,
    });

    return {helper, code: helper.source, schema, diagnostics};
}

/**
 * The annotated function takes no parameter, or exactly one typed as the
 * named parameter type (`Readonly<T>` accepted). Without a parameter type
 * it must take none.
 */
export function checkSignature(
    params: readonly DeclaredParam[],
    schemaName: string | undefined,
): void {
    if (params.length === 0) return;

    const shape = params
        .map((p) => (p.type ? `${p.name}: ${p.type}` : p.name))
        .join(', ');

    if (schemaName === undefined) {
        throw new GenerationError(
            'SignatureMismatch',
            `Annotated function takes (${shape}) but no parameter type was named; it must take no parameters.`,
        );
    }

    if (params.length > 1) {
        throw new GenerationError(
            'SignatureMismatch',
            `Annotated function takes ${params.length} parameters (${shape}); expected none or one of type "${schemaName}".`,
        );
    }

    const [param] = params;
    const type = (param.type ?? '').replace(/\s+/g, '');
    if (type !== schemaName && type !== `Readonly<${schemaName}>`) {
        const actual = param.type ? `typed "${param.type}"` : 'untyped';
        throw new GenerationError(
            'SignatureMismatch',
            `Parameter "${param.name}" is ${actual}; expected "${schemaName}".`,
        );
    }
}
