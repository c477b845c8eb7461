export { Expr, Num, Bin, num, bin, foldExpr } from './src/ast';
export {
    ErrorCode,
    CalculatorError,
    ParseError,
    EvaluationError,
    DivisionByZeroError,
    InvalidOperatorError,
} from './src/errors';
export { evaluate, applyOperator } from './src/evaluate';
export { ParseOptions, parseExpr } from './src/parser';
export { Operator, isOperator, precedence } from './src/precedence';
export { printExpr } from './src/print';
export { Result, safeParse, safeEvaluate, calculate } from './src/result';
export { Token, tokenize, tokenGrammar } from './src/tokens';
