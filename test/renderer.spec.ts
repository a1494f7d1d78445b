// test/renderer.spec.ts

import {describe, it, expect} from 'vitest';
import ts from 'typescript';
import {parseTemplate} from '../src/ast';
import {bindTemplate} from '../src/core/binder';
import {compilePath, renderHelper, renderPath} from '../src/core/renderer';
import type {GeneratedFunction, ParameterSchema} from '../src/schema';
import {generationErrorOf} from './support';

function schemaOf(name: string, ...fieldNames: string[]): ParameterSchema {
    return {
        name,
        fields: fieldNames.map((field, position) => ({name: field, type: 'string', position})),
    };
}

function helperFor(raw: string, schema?: ParameterSchema): GeneratedFunction {
    const {bound, schema: resolved} = bindTemplate(parseTemplate(raw), schema);
    return renderHelper(bound, {schema: resolved});
}

/**
 * Transpile the emitted helper to JavaScript and call it.
 */
function evaluate(helper: GeneratedFunction, values?: object): unknown {
    const js = ts.transpileModule(helper.source, {
        compilerOptions: {target: ts.ScriptTarget.ES2020},
    }).outputText;
    const run = new Function('values', `${js}\nreturn ${helper.name}(values);`);
    return run(values);
}

describe('renderHelper', () => {
    it('emits a parameterless helper for literal-only templates', () => {
        const helper = helperFor('/customers');

        expect(helper.parameter).toBeNull();
        expect(helper.returnType).toBe('string');
        expect(helper.source).toBe(
            ['function endpoint(): string {', '    return "/customers";', '}'].join('\n'),
        );
        expect(evaluate(helper)).toBe('/customers');
    });

    it('emits a helper taking the parameter type read-only', () => {
        const helper = helperFor('/customers/{customer_id}', schemaOf('PathParameters', 'customer_id'));

        expect(helper.parameter).toEqual({name: 'params', type: 'PathParameters'});
        expect(helper.source).toBe(
            [
                'function endpoint(params: Readonly<PathParameters>): string {',
                '    return "/customers/" + String(params.customer_id);',
                '}',
            ].join('\n'),
        );
        expect(evaluate(helper, {customer_id: 1})).toBe('/customers/1');
    });

    it('honors name and indentStep', () => {
        const {bound} = bindTemplate(parseTemplate('/ping'), undefined);
        const helper = renderHelper(bound, {name: 'pingPath', indentStep: 2});

        expect(helper.source).toBe(
            ['function pingPath(): string {', '  return "/ping";', '}'].join('\n'),
        );
    });

    it('returns an empty string for an empty template', () => {
        const helper = helperFor('');

        expect(helper.source).toBe(['function endpoint(): string {', '    return "";', '}'].join('\n'));
        expect(evaluate(helper)).toBe('');
    });

    it('emits literal text verbatim, quotes and backslashes included', () => {
        const helper = helperFor('/a"b\\c');

        expect(helper.source).toBe(
            ['function endpoint(): string {', '    return "/a\\"b\\\\c";', '}'].join('\n'),
        );
        expect(evaluate(helper)).toBe('/a"b\\c');
    });

    it('fails with MissingSchema when bindings come without a parameter type', () => {
        const {bound} = bindTemplate(parseTemplate('/a/{id}'), schemaOf('P', 'id'));

        const err = generationErrorOf(() => renderHelper(bound));

        expect(err.code).toBe('MissingSchema');
    });
});

describe('renderPath', () => {
    it('concatenates adjacent placeholders directly', () => {
        const render = compilePath('{a}{b}', schemaOf('P', 'a', 'b'));

        expect(render({a: 'x', b: 'y'})).toBe('xy');
    });

    it('keeps leading literal text before adjacent placeholders', () => {
        const render = compilePath('/{a}{b}', schemaOf('P', 'a', 'b'));

        expect(render({a: 'x', b: 'y'})).toBe('/xy');
    });

    it('renders duplicates with the same value', () => {
        const render = compilePath('/a/{x}/{x}', schemaOf('P', 'x'));

        expect(render({x: 5})).toBe('/a/5/5');
    });

    it('substitutes in template order, not field order', () => {
        const render = compilePath('/{b}/{a}', schemaOf('P', 'a', 'b'));

        expect(render({a: 1, b: 2})).toBe('/2/1');
    });

    it('uses natural string conversion without escaping', () => {
        const render = compilePath('/q/{term}', schemaOf('P', 'term'));

        expect(render({term: 'a b/c?d'})).toBe('/q/a b/c?d');
        expect(render({term: null})).toBe('/q/null');
        expect(render({term: true})).toBe('/q/true');
    });

    it('is deterministic', () => {
        const render = compilePath('/customers/{id}', schemaOf('P', 'id'));

        expect(render({id: 42})).toBe(render({id: 42}));
    });

    it('renders literal-only templates without values', () => {
        expect(compilePath('/customers')()).toBe('/customers');
    });

    it('requires values when the template has placeholders', () => {
        const {bound} = bindTemplate(parseTemplate('/a/{id}'), schemaOf('P', 'id'));

        expect(() => renderPath(bound)).toThrow(
            'A parameter value is required to render placeholder "id".',
        );
    });

    it('matches the emitted helper for the same values', () => {
        const schema = schemaOf('P', 'org', 'repo', 'n');
        const raw = '/orgs/{org}/repos/{repo}/issues/{n}';
        const values = {org: 'acme', repo: 'tools', n: 7};

        expect(evaluate(helperFor(raw, schema), values)).toBe(compilePath(raw, schema)(values));
    });
});
