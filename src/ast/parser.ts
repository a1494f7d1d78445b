// src/ast/parser.ts

import {GenerationError} from '../core/errors';
import {
    DEFAULT_DELIMITERS,
    type Delimiters,
    type Segment,
    type Template,
} from '../schema';

export interface TemplateParseOptions {
    /**
     * Placeholder delimiters, one character each.
     * Default: "{" and "}".
     */
    delimiters?: Delimiters;
}

type ScanState = 'literal' | 'placeholder';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Main entry: parse an endpoint template into ordered segments.
 *
 * Single left-to-right scan over two states:
 * - literal: text is accumulated until an open delimiter starts a placeholder.
 *   A close delimiter here is unmatched and an error.
 * - placeholder: the identifier is accumulated until the close delimiter.
 *
 * Empty literal runs are dropped. Throws GenerationError on malformed input.
 */
export function parseTemplate(
    raw: string,
    opts: TemplateParseOptions = {},
): Template {
    const {open, close} = opts.delimiters ?? DEFAULT_DELIMITERS;

    const segments: Segment[] = [];
    let state: ScanState = 'literal';
    let buffer = '';
    let placeholderStart = 0; // 0-based index of the open delimiter

    const flushLiteral = () => {
        if (buffer) {
            segments.push({kind: 'literal', text: buffer});
        }
        buffer = '';
    };

    for (let i = 0; i < raw.length; i++) {
        const ch = raw[i];

        if (state === 'literal') {
            if (ch === open) {
                flushLiteral();
                state = 'placeholder';
                placeholderStart = i;
                continue;
            }

            if (ch === close) {
                throw new GenerationError(
                    'UnmatchedCloseDelimiter',
                    `Unmatched "${close}" at column ${i + 1} in template "${raw}".`,
                    {column: i + 1},
                );
            }

            buffer += ch;
            continue;
        }

        // state === 'placeholder'
        if (ch === open) {
            throw new GenerationError(
                'NestedPlaceholder',
                `Nested "${open}" at column ${i + 1} in template "${raw}"; placeholders cannot be nested.`,
                {column: i + 1},
            );
        }

        if (ch === close) {
            const name = buffer;
            if (!IDENTIFIER.test(name)) {
                throw new GenerationError(
                    'InvalidPlaceholderName',
                    name
                        ? `Invalid placeholder name "${name}" at column ${placeholderStart + 1} in template "${raw}".`
                        : `Empty placeholder at column ${placeholderStart + 1} in template "${raw}".`,
                    {column: placeholderStart + 1, placeholder: name},
                );
            }
            segments.push({
                kind: 'placeholder',
                name,
                column: placeholderStart + 1,
            });
            buffer = '';
            state = 'literal';
            continue;
        }

        buffer += ch;
    }

    if (state === 'placeholder') {
        throw new GenerationError(
            'UnterminatedPlaceholder',
            `Placeholder opened at column ${placeholderStart + 1} is never closed in template "${raw}".`,
            {column: placeholderStart + 1},
        );
    }

    flushLiteral();

    return {raw, segments};
}

/**
 * Placeholder names in occurrence order (duplicates kept).
 */
export function extractPlaceholderNames(
    raw: string,
    opts: TemplateParseOptions = {},
): string[] {
    const names: string[] = [];
    for (const segment of parseTemplate(raw, opts).segments) {
        if (segment.kind === 'placeholder') names.push(segment.name);
    }
    return names;
}

export function countPlaceholders(template: Template): number {
    return template.segments.filter((s) => s.kind === 'placeholder').length;
}

/**
 * Throws unless both delimiters are single, distinct characters.
 */
export function assertValidDelimiters(delimiters: Delimiters): void {
    const {open, close} = delimiters;
    if (open.length !== 1 || close.length !== 1) {
        throw new Error(
            `Delimiters must be single characters, got open="${open}", close="${close}".`,
        );
    }
    if (open === close) {
        throw new Error(`Open and close delimiters must differ, both are "${open}".`);
    }
}
