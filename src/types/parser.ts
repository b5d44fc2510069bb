/**
 * Parser Types
 */

export type TokenType =
    | 'VARIABLE'      // A..Z
    | 'CONSTANT'      // TRUE, FALSE, 1, 0
    | 'NOT'           // NOT, ~, !
    | 'AND'           // AND, &
    | 'OR'            // OR, |
    | 'XOR'           // XOR, ^
    | 'IMPLIES'       // ->, IMPLIES
    | 'EQUIV'         // <->, EQUIV
    | 'NAND'          // NAND(a, b)
    | 'NOR'           // NOR(a, b)
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'COMMA'         // ,
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
