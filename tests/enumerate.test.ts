import { allTuples, allAssignments, tupleToIndex, grayCode } from '../src/utils/enumerate.js';

describe('allTuples', () => {
    test('first position changes slowest', () => {
        expect([...allTuples([0, 1], 2)]).toEqual([[0, 0], [0, 1], [1, 0], [1, 1]]);
    });

    test('arity zero yields the empty tuple once', () => {
        expect([...allTuples(['x'], 0)]).toEqual([[]]);
    });

    test('yields |domain|^arity tuples', () => {
        expect([...allTuples(['a', 'b', 'c'], 3)]).toHaveLength(27);
    });
});

describe('allAssignments', () => {
    test('False before True, first key outermost', () => {
        const assignments = [...allAssignments(['P', 'Q'])].map(m => [...m.entries()]);
        expect(assignments).toEqual([
            [['P', false], ['Q', false]],
            [['P', false], ['Q', true]],
            [['P', true], ['Q', false]],
            [['P', true], ['Q', true]],
        ]);
    });
});

describe('tupleToIndex', () => {
    test('first value is the most significant bit', () => {
        expect(tupleToIndex([true, false, false])).toBe(4);
        expect(tupleToIndex([false, true, true])).toBe(3);
        expect(tupleToIndex([])).toBe(0);
    });
});

describe('grayCode', () => {
    const bits = (codes: boolean[][]) => codes.map(c => c.map(b => (b ? '1' : '0')).join(''));

    test('widths 0 to 2', () => {
        expect(bits(grayCode(0))).toEqual(['']);
        expect(bits(grayCode(1))).toEqual(['0', '1']);
        expect(bits(grayCode(2))).toEqual(['00', '01', '11', '10']);
    });

    test('neighbours differ in exactly one bit', () => {
        const codes = grayCode(3);
        for (let i = 1; i < codes.length; i++) {
            const changed = codes[i].filter((b, j) => b !== codes[i - 1][j]).length;
            expect(changed).toBe(1);
        }
    });
});
