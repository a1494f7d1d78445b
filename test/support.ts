// test/support.ts

import {GenerationError} from '../src/core/errors';

/**
 * Run fn and return the GenerationError it throws; fails otherwise.
 */
export function generationErrorOf(fn: () => unknown): GenerationError {
    try {
        fn();
    } catch (err) {
        if (err instanceof GenerationError) return err;
        throw err;
    }
    throw new Error('Expected a GenerationError to be thrown');
}
