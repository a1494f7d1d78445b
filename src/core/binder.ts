// src/core/binder.ts

import type {
    BoundSegment,
    ParameterSchema,
    Template,
    UnusedSchemaPolicy,
} from '../schema';
import {countPlaceholders} from '../ast/parser';
import {buildFieldMap} from './schema-resolver';
import {GenerationError, type Diagnostic} from './errors';

export interface BindOptions {
    /**
     * Default: 'error'.
     */
    unusedSchema?: UnusedSchemaPolicy;
}

export interface BindResult {
    bound: BoundSegment[];
    /**
     * Schema the helper takes, undefined when the template has no
     * placeholders (even if one was supplied under the 'warn' policy).
     */
    schema: ParameterSchema | undefined;
    diagnostics: Diagnostic[];
}

/**
 * Pair every placeholder with the schema field of the same name.
 *
 * Either every placeholder binds or this throws; no partial result is
 * ever returned. Fields nobody references are fine.
 */
export function bindTemplate(
    template: Template,
    schema: ParameterSchema | undefined,
    opts: BindOptions = {},
): BindResult {
    const policy = opts.unusedSchema ?? 'error';
    const diagnostics: Diagnostic[] = [];
    const placeholders = countPlaceholders(template);

    if (placeholders === 0) {
        if (schema) {
            const message = `Template "${template.raw}" has no placeholders but parameter type "${schema.name}" was given.`;
            if (policy === 'error') {
                throw new GenerationError('UnusedSchema', message);
            }
            diagnostics.push({
                line: 0,
                message,
                severity: 'warning',
                code: 'UnusedSchema',
            });
        }

        const bound: BoundSegment[] = [];
        for (const segment of template.segments) {
            if (segment.kind === 'literal') {
                bound.push({kind: 'literal', text: segment.text});
            }
        }
        return {bound, schema: undefined, diagnostics};
    }

    if (!schema) {
        throw new GenerationError(
            'MissingSchema',
            `Template "${template.raw}" has ${placeholders} placeholder(s) but no parameter type was given.`,
        );
    }

    const fields = buildFieldMap(schema);
    const bound: BoundSegment[] = [];

    for (const segment of template.segments) {
        if (segment.kind === 'literal') {
            bound.push({kind: 'literal', text: segment.text});
            continue;
        }

        const field = fields.get(segment.name);
        if (!field) {
            throw new GenerationError(
                'UnboundPlaceholder',
                `Placeholder "${segment.name}" has no matching field in parameter type "${schema.name}".`,
                {column: segment.column, placeholder: segment.name},
            );
        }
        bound.push({kind: 'binding', placeholder: segment.name, field});
    }

    return {bound, schema, diagnostics};
}
