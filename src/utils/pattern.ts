/**
 * Pattern helpers shared by route matching and socket waits
 */

import { InvalidPatternError } from '../core/errors.js';

/**
 * Compile a caller-supplied pattern.
 * @throws InvalidPatternError if the source is not a valid regular expression
 */
export function compilePattern(pattern: string | RegExp, flags?: string): RegExp {
    if (pattern instanceof RegExp) {
        return flags === undefined ? pattern : new RegExp(pattern.source, flags);
    }
    try {
        return new RegExp(pattern, flags);
    } catch (error) {
        throw new InvalidPatternError(pattern, error instanceof Error ? error.message : String(error));
    }
}

/**
 * Compile without throwing; `undefined` for an invalid source.
 */
export function tryCompilePattern(pattern: string, flags?: string): RegExp | undefined {
    try {
        return new RegExp(pattern, flags);
    } catch {
        return undefined;
    }
}

/**
 * Stateless test: a global or sticky RegExp would otherwise carry lastIndex between calls.
 */
export function testPattern(regex: RegExp, value: string): boolean {
    regex.lastIndex = 0;
    return regex.test(value);
}

/**
 * URL filter for socket waits: `*` and empty match everything, then exact
 * equality, then the pattern as a regular expression. An invalid expression
 * matches nothing.
 */
export function matchesUrl(url: string, pattern: string): boolean {
    if (pattern === '' || pattern === '*') return true;
    if (url === pattern) return true;
    const regex = tryCompilePattern(pattern);
    return regex !== undefined && regex.test(url);
}

/**
 * Payload filter for socket waits: exact equality first, then the pattern as
 * a regular expression. Case-insensitive mode lower-cases both sides for the
 * equality test and adds the `i` flag. An invalid expression matches nothing.
 */
export function matchesMessage(payload: string, pattern: string, caseSensitive: boolean): boolean {
    if (pattern === '') return true;

    const exact = caseSensitive
        ? payload === pattern
        : payload.toLowerCase() === pattern.toLowerCase();
    if (exact) return true;

    const regex = tryCompilePattern(pattern, caseSensitive ? undefined : 'i');
    return regex !== undefined && regex.test(payload);
}
