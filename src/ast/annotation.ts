// src/ast/annotation.ts

import {GenerationError} from '../core/errors';

/**
 * Arguments of an endpoint annotation, e.g.
 *   @endpoint "/customers/{customer_id}" params=PathParameters name=customerPath
 */
export interface EndpointAnnotation {
    template: string;
    /** Name of the parameter schema type. */
    params?: string;
    /** Helper name override. */
    name?: string;
}

export interface AnnotationTag {
    /** Raw argument text after the tag name. */
    args: string;
    /** 0-based line index inside the comment. */
    lineOffset: number;
}

type AnnotationKey = 'params' | 'name';

const ANNOTATION_KEYS: readonly AnnotationKey[] = ['params', 'name'];
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function isAnnotationKey(key: string): key is AnnotationKey {
    return ANNOTATION_KEYS.some((k) => k === key);
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Find every `@<tag>` line in a JSDoc block comment (including the
 * "/**" and "*\/" markers).
 */
export function findAnnotationTags(comment: string, tag: string): AnnotationTag[] {
    const body = comment.replace(/^\/\*\*/, '').replace(/\*\/$/, '');
    const pattern = new RegExp(`^@${escapeRegExp(tag)}(?:\\s+(.*))?$`);

    const found: AnnotationTag[] = [];
    body.split(/\r?\n/).forEach((rawLine, lineOffset) => {
        const line = rawLine.replace(/^\s*\*?/, '').trim();
        const m = line.match(pattern);
        if (m) {
            found.push({args: (m[1] ?? '').trim(), lineOffset});
        }
    });
    return found;
}

/**
 * Parse annotation arguments: a quoted template followed by optional
 * `key=value` pairs. Pairs may be separated by whitespace or commas, and
 * values may be quoted.
 */
export function parseAnnotationArgs(args: string): EndpointAnnotation {
    let pos = 0;

    function fail(message: string, at: number = pos): never {
        throw new GenerationError('InvalidAnnotation', message, {column: at + 1});
    }

    const skipSeparators = () => {
        while (pos < args.length && /[\s,]/.test(args[pos])) pos++;
    };

    const readQuoted = (): string => {
        const quote = args[pos];
        const start = pos;
        const end = args.indexOf(quote, pos + 1);
        if (end === -1) {
            fail(`Unterminated string starting at column ${start + 1}.`, start);
        }
        pos = end + 1;
        return args.slice(start + 1, end);
    };

    const isQuote = (ch: string | undefined) => ch === '"' || ch === "'";

    skipSeparators();
    if (!isQuote(args[pos])) {
        fail('Expected a quoted endpoint template as the first argument.');
    }
    const annotation: EndpointAnnotation = {template: readQuoted()};
    const seen = new Set<AnnotationKey>();

    for (;;) {
        skipSeparators();
        if (pos >= args.length) break;

        const keyStart = pos;
        const keyMatch = /^[A-Za-z_][A-Za-z0-9_]*/.exec(args.slice(pos));
        if (!keyMatch) {
            fail(`Unexpected "${args[pos]}" at column ${pos + 1}.`);
        }
        const key = keyMatch[0];
        pos += key.length;

        while (pos < args.length && /\s/.test(args[pos])) pos++;
        if (args[pos] !== '=') {
            fail(`Expected "=" after "${key}".`);
        }
        pos++;
        while (pos < args.length && /\s/.test(args[pos])) pos++;

        let value: string;
        if (isQuote(args[pos])) {
            value = readQuoted();
        } else {
            const valueStart = pos;
            while (pos < args.length && !/[\s,]/.test(args[pos])) pos++;
            value = args.slice(valueStart, pos);
        }

        if (!isAnnotationKey(key)) {
            fail(
                `Unknown argument "${key}". Supported: ${ANNOTATION_KEYS.join(', ')}.`,
                keyStart,
            );
        }
        if (seen.has(key)) {
            fail(`Argument "${key}" given more than once.`, keyStart);
        }
        if (!IDENTIFIER.test(value)) {
            fail(`Argument "${key}" must be an identifier, got "${value}".`, keyStart);
        }
        seen.add(key);
        annotation[key] = value;
    }

    return annotation;
}
