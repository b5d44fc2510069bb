import type { Variable } from '../types/ast.js';

const STANDALONE_LETTER = /\b[A-Z]\b/g;

/**
 * Extract the sorted, deduplicated set of single-letter variables.
 *
 * Letters are matched as whole words of the uppercased text, so the letters
 * inside keywords such as AND or NOR never count. Never throws.
 */
export function extractVariables(text: string): Variable[] {
    const found = new Set(text.toUpperCase().match(STANDALONE_LETTER) ?? []);
    return [...found].sort();
}

/**
 * Check that a string names a single variable A-Z
 */
export function isVariable(name: string): boolean {
    return /^[A-Z]$/.test(name);
}
