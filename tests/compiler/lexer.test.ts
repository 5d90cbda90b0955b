import { describe, it, expect } from 'vitest';
import { tokenize, Tokenizer } from '../../src/compiler/lexer.js';
import { ParseError } from '../../src/compiler/errors.js';

function types(input: string): string[] {
  return tokenize(input).map((t) => t.type);
}

function values(input: string): string[] {
  return tokenize(input).map((t) => t.value);
}

describe('Lexer', () => {
  it('should tokenize a comparison', () => {
    expect(types('a == b')).toEqual(['LITERAL', 'OPERATOR', 'LITERAL', 'EOF']);
    expect(values('a == b')).toEqual(['a', '==', 'b', '']);
  });

  it('should tokenize parentheses and connectives', () => {
    expect(types('(a>1) && b<2 || c==3')).toEqual([
      'LPAREN', 'LITERAL', 'OPERATOR', 'LITERAL', 'RPAREN', 'AND',
      'LITERAL', 'OPERATOR', 'LITERAL', 'OR',
      'LITERAL', 'OPERATOR', 'LITERAL', 'EOF',
    ]);
  });

  it('should prefer longer operators over their prefixes', () => {
    expect(values('a!>>b')).toEqual(['a', '!>>', 'b', '']);
    expect(values('a!<<b')).toEqual(['a', '!<<', 'b', '']);
    expect(values('x>=1')).toEqual(['x', '>=', '1', '']);
    expect(values('x<=1')).toEqual(['x', '<=', '1', '']);
    expect(values('x>>y')).toEqual(['x', '>>', 'y', '']);
    expect(values('x!=y')).toEqual(['x', '!=', 'y', '']);
  });

  it('should accept a lone = as an operator token', () => {
    expect(tokenize('a=b')[1]).toMatchObject({ type: 'OPERATOR', value: '=' });
  });

  it('should end literals at operators without whitespace', () => {
    expect(values('%player_level%>=10')).toEqual(['%player_level%', '>=', '10', '']);
  });

  it('should keep single & and | inside literals', () => {
    expect(values('a & b')).toEqual(['a', '&', 'b', '']);
    expect(values('a|b == c')).toEqual(['a|b', '==', 'c', '']);
  });

  it('should treat quoted connectives and operators as literal text', () => {
    const tokens = tokenize("'a && b' == 'a && b'");
    expect(tokens.map((t) => t.type)).toEqual(['LITERAL', 'OPERATOR', 'LITERAL', 'EOF']);
    expect(tokens[0].value).toBe('a && b');
    expect(tokens[2].value).toBe('a && b');
  });

  it('should strip double quotes and keep parentheses inside them', () => {
    expect(values('"(x || y)" >> "y)"')).toEqual(['(x || y)', '>>', 'y)', '']);
  });

  it('should keep the escaped character after a backslash', () => {
    expect(tokenize("'it\\'s' == x")[0].value).toBe("it's");
    expect(tokenize('"a\\nb" == x')[0].value).toBe('anb');
  });

  it('should join quoted segments with surrounding text', () => {
    expect(tokenize('abc"d e"f == x')[0].value).toBe('abcd ef');
  });

  it('should allow empty quoted literals', () => {
    expect(values("'' == x")).toEqual(['', '==', 'x', '']);
  });

  it('should track position', () => {
    const tokens = tokenize('a == b');
    expect(tokens.map((t) => t.pos)).toEqual([0, 2, 5, 6]);
  });

  it('should skip all whitespace kinds', () => {
    expect(types('\ta\n==\r\n b ')).toEqual(['LITERAL', 'OPERATOR', 'LITERAL', 'EOF']);
  });

  it('should yield EOF for blank input', () => {
    expect(tokenize('   ')).toEqual([{ type: 'EOF', value: '', pos: 3 }]);
  });

  it('should stay at EOF once reached', () => {
    const tokenizer = new Tokenizer('a');
    expect(tokenizer.current()).toMatchObject({ type: 'LITERAL', value: 'a' });
    expect(tokenizer.advance().type).toBe('EOF');
    expect(tokenizer.advance().type).toBe('EOF');
    expect(tokenizer.current().type).toBe('EOF');
  });

  it('should produce tokens lazily', () => {
    const tokenizer = new Tokenizer('a == b');
    expect(tokenizer.current().value).toBe('a');
    expect(tokenizer.advance().value).toBe('==');
    expect(tokenizer.current().value).toBe('==');
  });

  it('should throw on null input', () => {
    expect(() => new Tokenizer(null)).toThrow(ParseError);
    expect(() => new Tokenizer(undefined)).toThrow('Expression is empty at position 0');
  });

  it('should throw on unterminated quotes', () => {
    expect(() => tokenize("'abc == x")).toThrow('Unterminated quoted literal at position 0');
    expect(() => tokenize('x == "abc')).toThrow(ParseError);
  });

  it('should treat a trailing backslash inside quotes as unterminated', () => {
    expect(() => tokenize("x == 'abc\\")).toThrow('Unterminated quoted literal at position 5');
  });
});
