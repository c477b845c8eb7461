import { Expr } from './ast';
import { CalculatorError, EvaluationError, ParseError } from './errors';
import { evaluate } from './evaluate';
import { ParseOptions, parseExpr } from './parser';

export type Result<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function safeParse(source: string, options?: ParseOptions): Result<Expr, ParseError> {
    try {
        return { ok: true, value: parseExpr(source, options) };
    } catch (e) {
        if (e instanceof ParseError) {
            return { ok: false, error: e };
        }
        throw e;
    }
}

export function safeEvaluate(expr: Expr): Result<number, EvaluationError> {
    try {
        return { ok: true, value: evaluate(expr) };
    } catch (e) {
        if (e instanceof EvaluationError) {
            return { ok: false, error: e };
        }
        throw e;
    }
}

export function calculate(source: string, options?: ParseOptions): Result<number, CalculatorError> {
    const parsed = safeParse(source, options);
    return parsed.ok ? safeEvaluate(parsed.value) : parsed;
}
