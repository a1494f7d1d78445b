// test/annotation.spec.ts

import {describe, it, expect} from 'vitest';
import {findAnnotationTags, parseAnnotationArgs} from '../src/ast/annotation';
import {generationErrorOf} from './support';

describe('findAnnotationTags', () => {
    it('finds the tag on its comment line', () => {
        const comment = [
            '/**',
            ' * Fetch one customer.',
            ' *',
            ' * @endpoint "/customers/{customer_id}" params=PathParameters',
            ' */',
        ].join('\n');

        expect(findAnnotationTags(comment, 'endpoint')).toEqual([
            {args: '"/customers/{customer_id}" params=PathParameters', lineOffset: 3},
        ]);
    });

    it('handles single-line comments', () => {
        expect(findAnnotationTags('/** @endpoint "/ping" */', 'endpoint')).toEqual([
            {args: '"/ping"', lineOffset: 0},
        ]);
    });

    it('ignores other tags and longer tag names', () => {
        const comment = ['/**', ' * @param id', ' * @endpoints "/x"', ' */'].join('\n');

        expect(findAnnotationTags(comment, 'endpoint')).toEqual([]);
    });

    it('uses the configured tag', () => {
        const comment = ['/**', ' * @route "/a"', ' * @endpoint "/b"', ' */'].join('\n');

        expect(findAnnotationTags(comment, 'route')).toEqual([{args: '"/a"', lineOffset: 1}]);
    });

    it('reports a bare tag with empty args', () => {
        expect(findAnnotationTags('/** @endpoint */', 'endpoint')).toEqual([
            {args: '', lineOffset: 0},
        ]);
    });
});

describe('parseAnnotationArgs', () => {
    it('reads the template alone', () => {
        expect(parseAnnotationArgs('"/customers"')).toEqual({template: '/customers'});
    });

    it('reads params and name in any order', () => {
        expect(parseAnnotationArgs('"/c/{id}" name=customerPath params=Ids')).toEqual({
            template: '/c/{id}',
            params: 'Ids',
            name: 'customerPath',
        });
    });

    it('accepts commas, single quotes and quoted values', () => {
        expect(parseAnnotationArgs("'/c/{id}', params = \"Ids\", name='p'")).toEqual({
            template: '/c/{id}',
            params: 'Ids',
            name: 'p',
        });
    });

    it('keeps an empty template', () => {
        expect(parseAnnotationArgs('""')).toEqual({template: ''});
    });

    it('requires a quoted template first', () => {
        const err = generationErrorOf(() => parseAnnotationArgs('/customers'));

        expect(err.code).toBe('InvalidAnnotation');
        expect(err.message).toBe('Expected a quoted endpoint template as the first argument.');
        expect(err.column).toBe(1);
    });

    it('rejects an unterminated template string', () => {
        const err = generationErrorOf(() => parseAnnotationArgs('"/customers'));

        expect(err.message).toBe('Unterminated string starting at column 1.');
    });

    it('rejects unknown keys', () => {
        const err = generationErrorOf(() => parseAnnotationArgs('"/a" foo=Bar'));

        expect(err.message).toBe('Unknown argument "foo". Supported: params, name.');
        expect(err.column).toBe(6);
    });

    it('rejects repeated keys', () => {
        const err = generationErrorOf(() => parseAnnotationArgs('"/a/{x}" params=A params=B'));

        expect(err.message).toBe('Argument "params" given more than once.');
    });

    it('rejects a key without a value', () => {
        const err = generationErrorOf(() => parseAnnotationArgs('"/a" params'));

        expect(err.message).toBe('Expected "=" after "params".');
    });

    it('rejects values that are not identifiers', () => {
        const err = generationErrorOf(() => parseAnnotationArgs('"/a" name=my-path'));

        expect(err.message).toBe('Argument "name" must be an identifier, got "my-path".');
    });
});
