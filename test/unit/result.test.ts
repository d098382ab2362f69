/**
 * @fileoverview Unit tests for Result helpers.
 * @module test/unit/result
 */

import { describe, it, expect } from 'vitest';
import { ok, err, mapResult, flatMapResult } from '../../src/utils/result.js';
import type { Result } from '../../src/types/base.js';

describe('result helpers', () => {
    it('wraps values and errors', () => {
        expect(ok(3)).toEqual({ ok: true, value: 3 });
        expect(err('bad')).toEqual({ ok: false, error: 'bad' });
    });

    it('maps only successes', () => {
        const success: Result<number, string> = ok(2);
        const failure: Result<number, string> = err('bad');
        expect(mapResult(success, (n) => n * 10)).toEqual({ ok: true, value: 20 });
        expect(mapResult(failure, (n) => n * 10)).toBe(failure);
    });

    it('short-circuits chains on the first error', () => {
        const half = (n: number): Result<number, string> => (n % 2 === 0 ? ok(n / 2) : err(`odd: ${n}`));
        expect(flatMapResult(ok(8), half)).toEqual({ ok: true, value: 4 });
        expect(flatMapResult(flatMapResult(ok(6), half), half)).toEqual({ ok: false, error: 'odd: 3' });
    });
});
