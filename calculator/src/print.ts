import { Expr, foldExpr } from './ast';

/** Renders `e` with every binary operation parenthesised, e.g. `((10 - 3) - 2)`. */
export function printExpr(e: Expr): string {
    return foldExpr<string>(e, (value) => String(value), (op, left, right) => `(${left} ${op} ${right})`);
}
