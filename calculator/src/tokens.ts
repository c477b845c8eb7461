import { ActionDict, Dict, MatchResult, Node, Semantics, grammar } from 'ohm-js';
import { ParseError } from './errors';
import { Operator, isOperator } from './precedence';

export type Token =
    | { type: 'num'; value: number; text: string; offset: number }
    | { type: 'op'; op: Operator; text: string; offset: number }
    | { type: 'lparen'; text: '('; offset: number }
    | { type: 'rparen'; text: ')'; offset: number };

// `any` as the last alternative keeps the match total, so an unknown
// character reaches token_unexpected with its offset instead of failing
// the whole match. `space` is narrowed from ohm's default, which also
// skips control characters.
export const tokenGrammar = grammar(String.raw`
  Tokens {
    Tokens = token*

    token
      = number
      | operator
      | paren
      | any  -- unexpected

    number
      = digit* "." digit*  -- fractional
      | digit+             -- whole

    operator = "+" | "-" | "*" | "/"

    paren = "(" | ")"

    space := " " | "\t" | "\n" | "\r"
  }
`);

const tokenSemantics: TokenSemantics = tokenGrammar.createSemantics() as TokenSemantics;

const tokenActions = {
    number(_n) {
        const text = this.sourceString;
        const value = Number(text);
        if (Number.isNaN(value)) {
            throw new ParseError(`Malformed number '${text}' at position ${this.source.startIdx}`, this.source.startIdx);
        }
        // overflow to Infinity, or underflow of a nonzero literal to 0
        if (!Number.isFinite(value) || (value === 0 && /[1-9]/.test(text))) {
            throw new ParseError(`Number out of range '${text}' at position ${this.source.startIdx}`, this.source.startIdx);
        }
        return { type: 'num', value, text, offset: this.source.startIdx };
    },

    operator(_op) {
        const text = this.sourceString;
        if (!isOperator(text)) {
            throw new ParseError(`Unexpected character '${text}' at position ${this.source.startIdx}`, this.source.startIdx);
        }
        return { type: 'op', op: text, text, offset: this.source.startIdx };
    },

    paren(_p) {
        return this.sourceString === '('
            ? { type: 'lparen', text: '(', offset: this.source.startIdx }
            : { type: 'rparen', text: ')', offset: this.source.startIdx };
    },

    token_unexpected(_c) {
        throw new ParseError(`Unexpected character '${this.sourceString}' at position ${this.source.startIdx}`, this.source.startIdx);
    },
} satisfies ActionDict<Token>;

tokenSemantics.addOperation<Token>('token', tokenActions);

tokenSemantics.addOperation<Token[]>('tokens', {
    Tokens(list) {
        return list.children.map((child: Node): Token => child.token());
    },
} satisfies ActionDict<Token[]>);

interface TokenDict extends Dict {
    tokens(): Token[];
}

interface TokenSemantics extends Semantics {
    (match: MatchResult): TokenDict;
}

export function tokenize(source: string): Token[] {
    const match = tokenGrammar.match(source, 'Tokens');
    if (match.failed()) {
        throw new ParseError('Syntax error while scanning expression.');
    }
    return tokenSemantics(match).tokens();
}
