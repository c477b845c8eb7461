import { Operator } from './precedence';

export type Expr = Num | Bin;

export interface Num {
    readonly type: 'num';
    readonly value: number;
}

export interface Bin {
    readonly type: 'bin';
    readonly op: Operator;
    readonly left: Expr;
    readonly right: Expr;
}

export const num = (value: number): Num => ({ type: 'num', value });
export const bin = (op: Operator, left: Expr, right: Expr): Bin => ({ type: 'bin', op, left, right });

type Step =
    | { kind: 'visit'; expr: Expr }
    | { kind: 'combine'; op: Operator };

/**
 * Bottom-up fold over the tree, left subtree before right. Iterative: a
 * left-deep `1 - 1 - ... - 1` chain is as deep as it is long.
 */
export function foldExpr<T>(root: Expr, leaf: (value: number) => T, combine: (op: Operator, left: T, right: T) => T): T {
    const steps: Step[] = [{ kind: 'visit', expr: root }];
    const results: T[] = [];

    for (let step = steps.pop(); step !== undefined; step = steps.pop()) {
        if (step.kind === 'combine') {
            const right = results[results.length - 1];
            const left = results[results.length - 2];
            results.length -= 2;
            results.push(combine(step.op, left, right));
            continue;
        }

        const e = step.expr;
        switch (e.type) {
            case 'num':
                results.push(leaf(e.value));
                break;
            case 'bin':
                steps.push({ kind: 'combine', op: e.op }, { kind: 'visit', expr: e.right }, { kind: 'visit', expr: e.left });
                break;
        }
    }

    return results[0];
}
