export type Operator = '+' | '-' | '*' | '/';

const PRECEDENCE: Record<Operator, number> = {
    '+': 1,
    '-': 1,
    '*': 2,
    '/': 2,
};

export function isOperator(s: string): s is Operator {
    return Object.prototype.hasOwnProperty.call(PRECEDENCE, s);
}

/** Binding power of `op`; 0 for anything that is not an operator. */
export function precedence(op: string): number {
    return isOperator(op) ? PRECEDENCE[op] : 0;
}
