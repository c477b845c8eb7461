export const enum ErrorCode {
    Parse = 'E_PARSE',
    DivisionByZero = 'E_DIVISION_BY_ZERO',
    InvalidOperator = 'E_INVALID_OPERATOR',
}

export class CalculatorError extends Error {
    constructor(message: string, public readonly code: ErrorCode) {
        super(message);
        this.name = new.target.name;
    }
}

export class ParseError extends CalculatorError {
    constructor(message: string, public readonly position?: number) {
        super(message, ErrorCode.Parse);
    }
}

export class EvaluationError extends CalculatorError { }

export class DivisionByZeroError extends EvaluationError {
    constructor() {
        super("Division by zero", ErrorCode.DivisionByZero);
    }
}

export class InvalidOperatorError extends EvaluationError {
    constructor(public readonly operator: string) {
        super(`Unknown operator '${operator}'`, ErrorCode.InvalidOperator);
    }
}
