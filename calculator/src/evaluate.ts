import { Expr, foldExpr } from './ast';
import { DivisionByZeroError, InvalidOperatorError } from './errors';

export function evaluate(e: Expr): number {
    return foldExpr<number>(e, (value) => value, applyOperator);
}

export function applyOperator(op: string, left: number, right: number): number {
    switch (op) {
        case '+':
            return left + right;
        case '-':
            return left - right;
        case '*':
            return left * right;
        case '/':
            if (right === 0) {
                throw new DivisionByZeroError();
            }
            return left / right;
        default:
            throw new InvalidOperatorError(op);
    }
}
