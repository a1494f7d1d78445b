// src/core/schema-resolver.ts

import type {
    FieldDescriptor,
    ParameterSchema,
    SchemaDeclaration,
} from '../schema';
import {GenerationError} from './errors';

/**
 * Parameter types visible to a generation pass, keyed by type name.
 */
export type SchemaRegistry = ReadonlyMap<string, SchemaDeclaration>;

/**
 * Build a registry from explicit declarations. Declarations sharing a
 * name are merged in order, the way interface declarations merge.
 */
export function createSchemaRegistry(
    declarations: Iterable<SchemaDeclaration>,
): SchemaRegistry {
    const registry = new Map<string, SchemaDeclaration>();
    for (const decl of declarations) {
        const existing = registry.get(decl.name);
        if (!existing) {
            registry.set(decl.name, decl);
            continue;
        }
        registry.set(decl.name, {
            name: decl.name,
            fields: [...existing.fields, ...decl.fields],
            extends: [...(existing.extends ?? []), ...(decl.extends ?? [])],
        });
    }
    return registry;
}

/**
 * Resolve a parameter type by name, flattening `extends` bases in front of
 * the type's own fields. Field order is declaration order.
 */
export function resolveSchema(
    typeName: string,
    registry: SchemaRegistry,
): ParameterSchema {
    const collected: Array<{name: string; type: string}> = [];
    collectFields(typeName, registry, collected, [], new Set());

    const seen = new Set<string>();
    const fields: FieldDescriptor[] = collected.map((field, position) => {
        if (seen.has(field.name)) {
            throw new GenerationError(
                'DuplicateField',
                `Field "${field.name}" is declared more than once in parameter type "${typeName}".`,
            );
        }
        seen.add(field.name);
        return {name: field.name, type: field.type, position};
    });

    return {name: typeName, fields};
}

function collectFields(
    typeName: string,
    registry: SchemaRegistry,
    out: Array<{name: string; type: string}>,
    chain: string[],
    visited: Set<string>,
): void {
    const decl = registry.get(typeName);
    if (!decl) {
        const via = chain.length ? ` (required by ${chain.join(' -> ')})` : '';
        throw new GenerationError(
            'UnknownSchemaType',
            `Parameter type "${typeName}" cannot be resolved${via}.`,
        );
    }

    // A base reached twice (diamond or cycle) contributes its fields once.
    if (visited.has(typeName)) return;
    visited.add(typeName);

    for (const base of decl.extends ?? []) {
        collectFields(base, registry, out, [...chain, typeName], visited);
    }
    out.push(...decl.fields);
}

/**
 * Field name -> descriptor lookup used by the binder.
 */
export function buildFieldMap(
    schema: ParameterSchema,
): ReadonlyMap<string, FieldDescriptor> {
    return new Map(schema.fields.map((field) => [field.name, field]));
}
