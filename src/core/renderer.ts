// src/core/renderer.ts

import {
    DEFAULT_HELPER_NAME,
    type BoundSegment,
    type Delimiters,
    type GeneratedFunction,
    type HelperParameter,
    type ParameterSchema,
    type UnusedSchemaPolicy,
} from '../schema';
import {parseTemplate} from '../ast/parser';
import {bindTemplate} from './binder';
import {GenerationError} from './errors';

/** Formal parameter name of every generated helper. */
export const HELPER_PARAM_NAME = 'params';

export interface RenderOptions {
    /** Helper name. Default: "endpoint". */
    name?: string;
    /** Schema the bindings were resolved against. */
    schema?: ParameterSchema;
    /** Spaces per indent level inside the helper. Default: 4. */
    indentStep?: number;
}

/**
 * Emit the helper declaration for a bound template.
 *
 * The body is a single concatenation in template order: literals as string
 * literals, bindings as `String(params.<field>)`. The helper takes no
 * parameter when nothing is bound.
 */
export function renderHelper(
    bound: readonly BoundSegment[],
    opts: RenderOptions = {},
): GeneratedFunction {
    const name = opts.name ?? DEFAULT_HELPER_NAME;
    const firstBinding = bound.find((s) => s.kind === 'binding');

    let parameter: HelperParameter | null = null;
    if (firstBinding) {
        if (!opts.schema) {
            throw new GenerationError(
                'MissingSchema',
                `Helper "${name}" binds placeholders but no parameter type was given.`,
            );
        }
        parameter = {name: HELPER_PARAM_NAME, type: opts.schema.name};
    }

    const indent = ' '.repeat(opts.indentStep ?? 4);
    const signature = parameter
        ? `${parameter.name}: Readonly<${parameter.type}>`
        : '';

    const source = [
        `function ${name}(${signature}): string {`,
        `${indent}return ${renderExpression(bound)};`,
        '}',
    ].join('\n');

    return {
        name,
        parameter,
        returnType: 'string',
        bound: [...bound],
        source,
    };
}

/**
 * The string expression a helper returns.
 */
export function renderExpression(bound: readonly BoundSegment[]): string {
    const parts = bound.map((segment) =>
        segment.kind === 'literal'
            ? JSON.stringify(segment.text)
            : `String(${HELPER_PARAM_NAME}.${segment.field.name})`,
    );
    return parts.length ? parts.join(' + ') : '""';
}

/**
 * Evaluate bound segments in process. Produces exactly what the emitted
 * helper returns for the same values.
 */
export function renderPath(bound: readonly BoundSegment[], values?: object): string {
    let out = '';
    for (const segment of bound) {
        if (segment.kind === 'literal') {
            out += segment.text;
            continue;
        }
        if (values === undefined) {
            throw new TypeError(
                `A parameter value is required to render placeholder "${segment.placeholder}".`,
            );
        }
        const value: unknown = Reflect.get(values, segment.field.name);
        out += String(value);
    }
    return out;
}

export interface CompilePathOptions {
    delimiters?: Delimiters;
    unusedSchema?: UnusedSchemaPolicy;
}

export type PathRenderer = (values?: object) => string;

/**
 * Parse and bind once, then render as often as needed.
 */
export function compilePath(
    template: string,
    schema?: ParameterSchema,
    opts: CompilePathOptions = {},
): PathRenderer {
    const parsed = parseTemplate(template, {delimiters: opts.delimiters});
    const {bound} = bindTemplate(parsed, schema, {unusedSchema: opts.unusedSchema});
    return (values) => renderPath(bound, values);
}
