/**
 * Shared enumeration utilities.
 * Used by: truth table generation.
 */

const BOOLEANS: readonly boolean[] = [false, true];

/**
 * Generate all n-tuples over domain, first position slowest-changing.
 */
export function* allTuples<T>(domain: readonly T[], arity: number): Generator<T[]> {
    if (arity === 0) { yield []; return; }
    if (arity === 1) { for (const d of domain) yield [d]; return; }
    for (const d of domain) {
        for (const rest of allTuples(domain, arity - 1)) {
            yield [d, ...rest];
        }
    }
}

/**
 * Generate all boolean assignments to keys, False before True,
 * first key outermost.
 */
export function* allAssignments<K>(keys: readonly K[]): Generator<Map<K, boolean>> {
    for (const tuple of allTuples(BOOLEANS, keys.length)) {
        yield new Map(keys.map((key, i): [K, boolean] => [key, tuple[i]]));
    }
}

/**
 * Row index of a boolean tuple, first position as most significant bit.
 */
export function tupleToIndex(values: readonly boolean[]): number {
    return values.reduce((index, bit) => index * 2 + (bit ? 1 : 0), 0);
}

/**
 * Reflected binary Gray code sequence of the given bit width.
 */
export function grayCode(width: number): boolean[][] {
    const size = 2 ** width;
    const codes: boolean[][] = [];
    for (let i = 0; i < size; i++) {
        const gray = i ^ (i >> 1);
        const bits: boolean[] = [];
        for (let bit = width - 1; bit >= 0; bit--) {
            bits.push(((gray >> bit) & 1) === 1);
        }
        codes.push(bits);
    }
    return codes;
}
