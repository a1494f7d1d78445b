// test/source-transform.spec.ts

import {describe, it, expect} from 'vitest';
import ts from 'typescript';
import {collectSchemaDeclarations, transformSource} from '../src/core/source-transform';

const lines = (...parts: string[]) => parts.join('\n');

describe('transformSource', () => {
    it('inserts the helper at the top of an annotated function', () => {
        const input = lines(
            'interface PathParameters {',
            '    customer_id: number;',
            '}',
            '',
            '/**',
            ' * @endpoint "/customers/{customer_id}" params=PathParameters',
            ' */',
            'export function getCustomer(params: PathParameters): string {',
            '    return endpoint(params);',
            '}',
            '',
        );

        const result = transformSource(input, {fileName: 'src/api.ts'});

        expect(result.errors).toEqual([]);
        expect(result.output).toBe(
            lines(
                'interface PathParameters {',
                '    customer_id: number;',
                '}',
                '',
                '/**',
                ' * @endpoint "/customers/{customer_id}" params=PathParameters',
                ' */',
                'export function getCustomer(params: PathParameters): string {',
                '    function endpoint(params: Readonly<PathParameters>): string {',
                '        return "/customers/" + String(params.customer_id);',
                '    }',
                '    return endpoint(params);',
                '}',
                '',
            ),
        );
        expect(result.helpers).toHaveLength(1);
        expect(result.helpers[0].functionName).toBe('getCustomer');
        expect(result.helpers[0].line).toBe(6);
        expect(result.helpers[0].helper.parameter).toEqual({
            name: 'params',
            type: 'PathParameters',
        });
    });

    it('indents helpers inside class methods', () => {
        const input = lines(
            'class Api {',
            '    /** @endpoint "/ping" */',
            '    ping(): string {',
            '        return endpoint();',
            '    }',
            '}',
        );

        const result = transformSource(input, {fileName: 'api.ts'});

        expect(result.output).toBe(
            lines(
                'class Api {',
                '    /** @endpoint "/ping" */',
                '    ping(): string {',
                '        function endpoint(): string {',
                '            return "/ping";',
                '        }',
                '        return endpoint();',
                '    }',
                '}',
            ),
        );
        expect(result.helpers[0].functionName).toBe('ping');
        expect(result.helpers[0].line).toBe(2);
    });

    it('handles arrow functions with a helper name override', () => {
        const input = lines(
            'type RepoParams = { owner: string; repo: string };',
            '',
            '/** @endpoint "/repos/{owner}/{repo}" params=RepoParams name=repoPath */',
            'export const getRepo = (params: Readonly<RepoParams>) => {',
            '    return repoPath(params);',
            '};',
        );

        const result = transformSource(input, {fileName: 'repos.ts'});

        expect(result.output).toBe(
            lines(
                'type RepoParams = { owner: string; repo: string };',
                '',
                '/** @endpoint "/repos/{owner}/{repo}" params=RepoParams name=repoPath */',
                'export const getRepo = (params: Readonly<RepoParams>) => {',
                '    function repoPath(params: Readonly<RepoParams>): string {',
                '        return "/repos/" + String(params.owner) + "/" + String(params.repo);',
                '    }',
                '    return repoPath(params);',
                '};',
            ),
        );
        expect(result.helpers[0].functionName).toBe('getRepo');
    });

    it('opens up an empty one-line body', () => {
        const input = lines('/** @endpoint "/health" */', 'function health() {}');

        const result = transformSource(input, {fileName: 'health.ts'});

        expect(result.output).toBe(
            lines(
                '/** @endpoint "/health" */',
                'function health() {',
                '    function endpoint(): string {',
                '        return "/health";',
                '    }',
                '}',
            ),
        );
    });

    it('moves same-line statements below the helper', () => {
        const input = lines('/** @endpoint "/v" */', 'function version() { return endpoint(); }');

        const result = transformSource(input, {fileName: 'v.ts', indentStep: 2});

        expect(result.output).toBe(
            lines(
                '/** @endpoint "/v" */',
                'function version() {',
                '  function endpoint(): string {',
                '    return "/v";',
                '  }',
                '  return endpoint(); }',
            ),
        );
    });

    it('leaves the file untouched and reports every failing annotation', () => {
        const input = lines(
            'interface Ids {',
            '    id: string;',
            '}',
            '/** @endpoint "/ok/{id}" params=Ids */',
            'function ok(params: Ids) {',
            '    return endpoint(params);',
            '}',
            '/** @endpoint "/bad/{nope}" params=Ids */',
            'function bad(params: Ids) {',
            '    return endpoint(params);',
            '}',
            '/** @endpoint "/open/{id" params=Ids */',
            'function open(params: Ids) {',
            '    return endpoint(params);',
            '}',
        );

        const result = transformSource(input, {fileName: 'src/mixed.ts'});

        expect(result.output).toBe(input);
        expect(result.helpers).toEqual([]);
        expect(result.errors.map((e) => e.format())).toEqual([
            'src/mixed.ts:8: [UnboundPlaceholder] Placeholder "nope" has no matching field in parameter type "Ids".',
            'src/mixed.ts:12: [UnterminatedPlaceholder] Placeholder opened at column 7 is never closed in template "/open/{id".',
        ]);
    });

    it('rejects annotations on non-functions', () => {
        const input = lines('/** @endpoint "/x" */', 'const value = 42;');

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result.errors.map((e) => e.code)).toEqual(['SignatureMismatch']);
        expect(result.errors[0].message).toBe(
            '"value" is not a function; the annotation applies to functions, methods and function-valued properties only.',
        );
    });

    it('inserts helpers into function-valued class properties', () => {
        const input = lines(
            'interface Ids { id: string }',
            'class Client {',
            '    /** @endpoint "/x/{id}" params=Ids */',
            '    get = (params: Ids) => {',
            '        return endpoint(params);',
            '    };',
            '}',
        );

        const result = transformSource(input, {fileName: 'client.ts'});

        expect(result.errors).toEqual([]);
        expect(result.output).toBe(
            lines(
                'interface Ids { id: string }',
                'class Client {',
                '    /** @endpoint "/x/{id}" params=Ids */',
                '    get = (params: Ids) => {',
                '        function endpoint(params: Readonly<Ids>): string {',
                '            return "/x/" + String(params.id);',
                '        }',
                '        return endpoint(params);',
                '    };',
                '}',
            ),
        );
        expect(result.helpers.map((h) => [h.functionName, h.line])).toEqual([['get', 3]]);
    });

    it('rejects tags on declarations that are not functions', () => {
        const input = lines(
            'interface Api {',
            '    /** @endpoint "/a" */',
            '    fetch(): string;',
            '}',
            'const routes = {',
            '    /** @endpoint "/b" */',
            '    home: "/",',
            '};',
            'class Store {',
            '    /** @endpoint "/c" */',
            '    limit = 10;',
            '}',
        );

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result.helpers).toEqual([]);
        expect(result.output).toBe(input);
        expect(result.errors.map((e) => [e.code, e.line, e.message])).toEqual([
            [
                'SignatureMismatch',
                2,
                '"fetch" is not a function; the annotation applies to functions, methods and function-valued properties only.',
            ],
            [
                'SignatureMismatch',
                6,
                '"home" is not a function; the annotation applies to functions, methods and function-valued properties only.',
            ],
            [
                'SignatureMismatch',
                10,
                '"limit" is not a function; the annotation applies to functions, methods and function-valued properties only.',
            ],
        ]);
    });

    it('rejects expression-bodied arrows', () => {
        const input = lines('/** @endpoint "/x" */', 'const f = () => endpoint();');

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result.errors[0].message).toBe('"f" has an expression body; use a block body.');
    });

    it('rejects a body that already declares the helper', () => {
        const input = lines(
            '/** @endpoint "/x" */',
            'function f() {',
            '    const endpoint = 1;',
            '    return endpoint;',
            '}',
        );

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result.errors.map((e) => e.code)).toEqual(['HelperConflict']);
        expect(result.errors[0].message).toBe('"f" already declares "endpoint" in its body.');
    });

    it('rejects more than one tag on a function', () => {
        const input = lines(
            '/**',
            ' * @endpoint "/a"',
            ' * @endpoint "/b"',
            ' */',
            'function f() {',
            '}',
        );

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result.errors.map((e) => e.format())).toEqual([
            'x.ts:3: [InvalidAnnotation] "f" has 2 @endpoint tags; only one is allowed.',
        ]);
    });

    it('checks the function signature against the parameter type', () => {
        const input = lines(
            'interface Ids { id: string }',
            '/** @endpoint "/a/{id}" params=Ids */',
            'function f(id: string) {',
            '    return endpoint({id});',
            '}',
        );

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result.errors.map((e) => e.format())).toEqual([
            'x.ts:2: [SignatureMismatch] Parameter "id" is typed "string"; expected "Ids".',
        ]);
    });

    it('ignores a this parameter', () => {
        const input = lines(
            'interface Ids { id: string }',
            '/** @endpoint "/a/{id}" params=Ids */',
            'function f(this: void, params: Ids) {',
            '}',
        );

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result.errors).toEqual([]);
        expect(result.helpers).toHaveLength(1);
    });

    it('honors a custom tag', () => {
        const input = lines('/** @route "/r" */', 'function r() {', '}');

        const untagged = transformSource(input, {fileName: 'x.ts'});
        const tagged = transformSource(input, {fileName: 'x.ts', tag: 'route'});

        expect(untagged.helpers).toEqual([]);
        expect(untagged.output).toBe(input);
        expect(tagged.helpers).toHaveLength(1);
    });

    it('returns files without annotations unchanged', () => {
        const input = lines('/** Plain docs. */', 'export function f() {', '    return 1;', '}');

        const result = transformSource(input, {fileName: 'x.ts'});

        expect(result).toEqual({
            fileName: 'x.ts',
            output: input,
            helpers: [],
            diagnostics: [],
            errors: [],
        });
    });

    it('locates unused-schema warnings at the annotation', () => {
        const input = lines(
            'interface Ids { id: string }',
            '/** @endpoint "/health" params=Ids */',
            'function f() {',
            '}',
        );

        const result = transformSource(input, {fileName: 'x.ts', unusedSchema: 'warn'});

        expect(result.errors).toEqual([]);
        expect(result.diagnostics).toEqual([
            {
                line: 2,
                message: 'Template "/health" has no placeholders but parameter type "Ids" was given.',
                severity: 'warning',
                code: 'UnusedSchema',
            },
        ]);
    });
});

describe('collectSchemaDeclarations', () => {
    it('reads interfaces, object type aliases and classes', () => {
        const sf = ts.createSourceFile(
            'types.ts',
            lines(
                'interface Base { org: string }',
                'interface Repo extends Base { repo: string; "issue-id"?: number }',
                'type Page = { page: number; size };',
                'type Alias = string;',
                'class Query {',
                '    static version = 1;',
                '    term: string = "";',
                '    constructor(public limit: number, other: string) {}',
                '}',
            ),
            ts.ScriptTarget.Latest,
            true,
        );

        expect(collectSchemaDeclarations(sf)).toEqual([
            {name: 'Base', fields: [{name: 'org', type: 'string'}], extends: []},
            {
                name: 'Repo',
                fields: [
                    {name: 'repo', type: 'string'},
                    {name: 'issue-id', type: 'number'},
                ],
                extends: ['Base'],
            },
            {
                name: 'Page',
                fields: [
                    {name: 'page', type: 'number'},
                    {name: 'size', type: 'unknown'},
                ],
            },
            {
                name: 'Query',
                fields: [
                    {name: 'term', type: 'string'},
                    {name: 'limit', type: 'number'},
                ],
                extends: [],
            },
        ]);
    });
});
