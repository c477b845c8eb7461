import { ParseError, ParseOptions, ErrorCode, bin, num, parseExpr, printExpr } from '../../calculator';

function parseError(source: string, options?: ParseOptions): ParseError {
    try {
        parseExpr(source, options);
    } catch (e) {
        if (e instanceof ParseError) return e;
        throw e;
    }
    throw new Error(`expected '${source}' to be rejected`);
}

const shape = (source: string, options?: ParseOptions) => printExpr(parseExpr(source, options));

describe('parseExpr', () => {
    test('builds a leaf for a single number', () => {
        expect(parseExpr('42')).toEqual(num(42));
        expect(parseExpr('(((7)))')).toEqual(num(7));
    });

    test('builds a binary node', () => {
        expect(parseExpr('1 + 2')).toEqual(bin('+', num(1), num(2)));
    });

    test('multiplication binds tighter than addition', () => {
        expect(shape('2 + 3 * 4')).toBe('(2 + (3 * 4))');
        expect(shape('2 * 3 + 4')).toBe('((2 * 3) + 4)');
    });

    test('equal precedence groups to the left', () => {
        expect(shape('10 - 3 - 2')).toBe('((10 - 3) - 2)');
        expect(shape('8 / 4 / 2')).toBe('((8 / 4) / 2)');
        expect(shape('1 - 2 + 3')).toBe('((1 - 2) + 3)');
    });

    test('parentheses override precedence', () => {
        expect(shape('(2 + 3) * 4')).toBe('((2 + 3) * 4)');
        expect(shape('2 * (3 + 4) - 5')).toBe('((2 * (3 + 4)) - 5)');
        expect(shape('((1+2)*(3+4))')).toBe('((1 + 2) * (3 + 4))');
    });

    test('whitespace does not change the tree', () => {
        expect(parseExpr('  2 +  3 *   4  ')).toEqual(parseExpr('2+3*4'));
    });

    test('rejects empty input', () => {
        expect(parseError('').message).toBe('Empty expression');
        expect(parseError('   ').message).toBe('Empty expression');
    });

    test('rejects adjacent operands', () => {
        const error = parseError('2 3');
        expect(error.message).toBe("Unexpected '3' at position 2");
        expect(error.position).toBe(2);
        expect(error.code).toBe(ErrorCode.Parse);
        expect(parseError('2 3 +').message).toBe("Unexpected '3' at position 2");
        expect(parseError('(1)(2)').message).toBe("Unexpected '(' at position 3");
        expect(parseError('1.2.3').message).toBe("Unexpected '.3' at position 3");
    });

    test('rejects missing operands', () => {
        expect(parseError('2 +').message).toBe('Unexpected end of expression');
        expect(parseError('* 2').message).toBe("Unexpected '*' at position 0");
        expect(parseError('2 * / 3').message).toBe("Unexpected '/' at position 4");
        expect(parseError('()').message).toBe("Unexpected ')' at position 1");
    });

    test('rejects unbalanced parentheses', () => {
        expect(parseError('(2 + 3').message).toBe("Unmatched '(' at position 0");
        expect(parseError('2 + 3)').message).toBe("Unmatched ')' at position 5");
        expect(parseError('((1 + 2)').message).toBe("Unmatched '(' at position 0");
    });

    test('surfaces tokenizer errors', () => {
        expect(parseError('2 + x').message).toBe("Unexpected character 'x' at position 4");
    });

    test('maxDepth bounds parenthesis nesting', () => {
        expect(parseError('((1))', { maxDepth: 1 }).message).toBe('Nesting depth exceeds 1 at position 1');
        expect(parseExpr('((1))', { maxDepth: 2 })).toEqual(num(1));
        expect(shape('(1) + (2)', { maxDepth: 1 })).toBe('(1 + 2)');
        expect(parseError('(1)', { maxDepth: 0 }).message).toBe('Nesting depth exceeds 0 at position 0');
    });
});
