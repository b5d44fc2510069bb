/**
 * Abstract Syntax Tree (AST) Types for Propositional Formulas
 */

/**
 * A propositional variable: a single uppercase letter A-Z
 */
export type Variable = string;

export type BinaryNodeType =
    | 'and'
    | 'or'
    | 'xor'
    | 'implies'
    | 'equiv'
    | 'nand'
    | 'nor';

export type FormulaNodeType = 'variable' | 'constant' | 'not' | BinaryNodeType;

export interface VariableNode {
    type: 'variable';
    name: Variable;
}

export interface ConstantNode {
    type: 'constant';
    value: boolean;
}

export interface NotNode {
    type: 'not';
    operand: FormulaNode;
}

export interface BinaryNode {
    type: BinaryNodeType;
    left: FormulaNode;
    right: FormulaNode;
}

export type FormulaNode = VariableNode | ConstantNode | NotNode | BinaryNode;
