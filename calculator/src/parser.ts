import { Expr, bin, num } from './ast';
import { ParseError } from './errors';
import { precedence } from './precedence';
import { Token, tokenize } from './tokens';

type OpToken = Extract<Token, { type: 'op' }>;
type LParenToken = Extract<Token, { type: 'lparen' }>;

export interface ParseOptions {
    /** Deepest parenthesis nesting accepted. Unbounded when omitted. */
    maxDepth?: number;
}

function fail(message: string, position?: number): never {
    throw new ParseError(message, position);
}

/**
 * Builds an expression tree from infix source with the shunting-yard
 * algorithm. Operators of equal precedence group to the left.
 */
export function parseExpr(source: string, options: ParseOptions = {}): Expr {
    const maxDepth = options.maxDepth ?? Infinity;
    const tokens = tokenize(source);

    const operands: Expr[] = [];
    const operators: (OpToken | LParenToken)[] = [];
    let depth = 0;
    // true while the next token must start an operand: a number or '('
    let expectOperand = true;

    const reduce = (token: OpToken): void => {
        const right = operands.pop();
        const left = operands.pop();
        if (left === undefined || right === undefined) {
            fail(`Missing operand for '${token.op}' at position ${token.offset}`, token.offset);
        }
        operands.push(bin(token.op, left, right));
    };

    for (const token of tokens) {
        const starts = token.type === 'num' || token.type === 'lparen';
        if (starts !== expectOperand) {
            fail(`Unexpected '${token.text}' at position ${token.offset}`, token.offset);
        }

        switch (token.type) {
            case 'num':
                operands.push(num(token.value));
                expectOperand = false;
                break;

            case 'lparen':
                if (++depth > maxDepth) {
                    fail(`Nesting depth exceeds ${maxDepth} at position ${token.offset}`, token.offset);
                }
                operators.push(token);
                break;

            case 'rparen': {
                let top = operators.pop();
                while (top !== undefined && top.type === 'op') {
                    reduce(top);
                    top = operators.pop();
                }
                if (top === undefined) {
                    fail(`Unmatched ')' at position ${token.offset}`, token.offset);
                }
                depth--;
                break;
            }

            case 'op': {
                let top = operators[operators.length - 1];
                while (top !== undefined && top.type === 'op' && precedence(top.op) >= precedence(token.op)) {
                    operators.pop();
                    reduce(top);
                    top = operators[operators.length - 1];
                }
                operators.push(token);
                expectOperand = true;
                break;
            }
        }
    }

    if (expectOperand) {
        fail(tokens.length === 0 ? 'Empty expression' : 'Unexpected end of expression', source.length);
    }

    for (let top = operators.pop(); top !== undefined; top = operators.pop()) {
        if (top.type === 'lparen') {
            fail(`Unmatched '(' at position ${top.offset}`, top.offset);
        }
        reduce(top);
    }

    const [root, ...rest] = operands;
    if (root === undefined) {
        fail('Empty expression', 0);
    }
    if (rest.length > 0) {
        fail('Malformed expression', 0);
    }
    return root;
}
