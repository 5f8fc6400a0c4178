/**
 * Unit Tests for pattern helpers
 */

import { InvalidPatternError } from '../../src/core/errors.js';
import {
    compilePattern,
    matchesMessage,
    matchesUrl,
    testPattern,
    tryCompilePattern,
} from '../../src/utils/pattern.js';

describe('pattern helpers', () => {
    describe('compilePattern', () => {
        it('should compile a string source', () => {
            expect(compilePattern('.*\\.png').test('https://cdn.test/logo.png')).toBe(true);
        });

        it('should throw InvalidPatternError for an invalid source', () => {
            expect(() => compilePattern('([')).toThrow(InvalidPatternError);
        });

        it('should return undefined from tryCompilePattern for an invalid source', () => {
            expect(tryCompilePattern('([')).toBeUndefined();
        });
    });

    it('should test global patterns without carrying lastIndex', () => {
        const regex = /api/g;

        expect(testPattern(regex, '/api/users')).toBe(true);
        expect(testPattern(regex, '/api/users')).toBe(true);
    });

    describe('matchesUrl', () => {
        it.each(['*', ''])('should treat %p as a wildcard', pattern => {
            expect(matchesUrl('wss://a.test/feed', pattern)).toBe(true);
        });

        it('should match exactly before trying a regular expression', () => {
            expect(matchesUrl('wss://a.test/feed?x=(1', 'wss://a.test/feed?x=(1')).toBe(true);
        });

        it('should match by regular expression', () => {
            expect(matchesUrl('wss://a.test/feed', 'a\\.test')).toBe(true);
            expect(matchesUrl('wss://b.test/feed', 'a\\.test')).toBe(false);
        });

        it('should treat an invalid expression as no match', () => {
            expect(matchesUrl('wss://a.test/feed', '([')).toBe(false);
        });
    });

    describe('matchesMessage', () => {
        it('should accept every payload for an empty pattern', () => {
            expect(matchesMessage('anything', '', true)).toBe(true);
        });

        it('should prefer exact equality', () => {
            expect(matchesMessage('[1]', '[1]', true)).toBe(true);
        });

        it('should fall back to a regular expression', () => {
            expect(matchesMessage('{"type":"ping"}', '"type":"p.ng"', true)).toBe(true);
        });

        it('should honour case sensitivity', () => {
            expect(matchesMessage('HELLO', 'hello', true)).toBe(false);
            expect(matchesMessage('HELLO', 'hello', false)).toBe(true);
            expect(matchesMessage('say HELLO', 'hel+o', false)).toBe(true);
        });

        it('should treat an invalid expression as no match', () => {
            expect(matchesMessage('payload', '([', true)).toBe(false);
        });
    });
});
