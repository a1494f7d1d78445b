// src/schema/template.ts

/**
 * Literal text copied verbatim into the rendered path.
 */
export interface LiteralSegment {
    kind: 'literal';
    text: string;
}

/**
 * A named hole in a template, e.g. `{customer_id}`.
 */
export interface PlaceholderSegment {
    kind: 'placeholder';
    name: string;
    /** 1-based column of the open delimiter in the raw template. */
    column: number;
}

export type Segment = LiteralSegment | PlaceholderSegment;

/**
 * Parsed endpoint template. Segment order is the substitution order.
 */
export interface Template {
    raw: string;
    segments: readonly Segment[];
}

export interface Delimiters {
    open: string;
    close: string;
}

/**
 * A single field of a parameter type, as declared.
 */
export interface FieldDescriptor {
    name: string;
    /** Declared type text (e.g. "number", "string | null"), "unknown" when undeclared. */
    type: string;
    /** 0-based position in declaration order. */
    position: number;
}

export interface ParameterSchema {
    name: string;
    fields: readonly FieldDescriptor[];
}

/**
 * Raw schema description as collected from source, before resolution.
 * Base types named in `extends` are flattened in front of the own fields.
 */
export interface SchemaDeclaration {
    name: string;
    fields: ReadonlyArray<{name: string; type: string}>;
    extends?: readonly string[];
}

export interface BoundLiteral {
    kind: 'literal';
    text: string;
}

export interface BoundField {
    kind: 'binding';
    placeholder: string;
    field: FieldDescriptor;
}

export type BoundSegment = BoundLiteral | BoundField;

/**
 * A parameter of the annotated function, as written in source.
 */
export interface DeclaredParam {
    name: string;
    /** Type annotation text, undefined when the parameter is untyped. */
    type?: string;
}

export interface HelperParameter {
    name: string;
    /** Name of the parameter schema type. */
    type: string;
}

/**
 * The emitted path helper.
 */
export interface GeneratedFunction {
    name: string;
    /** null when the template has no placeholders. */
    parameter: HelperParameter | null;
    returnType: 'string';
    bound: readonly BoundSegment[];
    /** Function declaration source, unindented, lines joined by "\n". */
    source: string;
}
