import { describe, it, expect } from 'vitest';
import { evaluateExpression, renderTemplate, resolveTemplateVars } from './encodeTemplate';
import { TemplateError } from '../utils/errors';

const details = { bitrate: 5000, size: 100, duration: 60 };

describe('evaluateExpression', () => {
  const noVariables = (name: string): number => {
    throw new Error(`unexpected ${name}`);
  };

  it('should respect precedence and parentheses', () => {
    expect(evaluateExpression('2 + 3 * 4', noVariables)).toBe(14);
    expect(evaluateExpression('(2 + 3) * 4', noVariables)).toBe(20);
    expect(evaluateExpression('10 / 4 - 1', noVariables)).toBe(1.5);
  });

  it('should handle unary signs and decimals', () => {
    expect(evaluateExpression('-(2) + 5', noVariables)).toBe(3);
    expect(evaluateExpression('.5 * 4', noVariables)).toBe(2);
  });

  it('should look up variables', () => {
    expect(evaluateExpression('rate * 2', () => 21)).toBe(42);
  });

  it('should reject malformed input', () => {
    expect(() => evaluateExpression('2 +', noVariables)).toThrow(TemplateError);
    expect(() => evaluateExpression('(2 + 3', noVariables)).toThrow('Missing ")" in "(2 + 3"');
    expect(() => evaluateExpression('2 % 3', noVariables)).toThrow(TemplateError);
    expect(() => evaluateExpression('1 / 0', noVariables)).toThrow('Division by zero in "1 / 0"');
  });
});

describe('resolveTemplateVars', () => {
  it('should resolve expressions against probed values and each other', () => {
    const vars = resolveTemplateVars(details, {
      minrate: 'bitrate*0.9',
      maxrate: 'bitrate*1.1',
      buffer: '(maxrate - minrate) / 2 + 1',
      half: 'var_bitrate / 2',
    });

    expect(vars).toEqual({
      bitrate: 5000,
      size: 100,
      duration: 60,
      minrate: 4500,
      maxrate: 5500,
      buffer: 501,
      half: 2500,
    });
  });

  it('should reject circular and unknown references', () => {
    expect(() => resolveTemplateVars(details, { a: 'b + 1', b: 'a + 1' })).toThrow(
      'Circular template variable: a -> b -> a'
    );
    expect(() => resolveTemplateVars(details, { a: 'nope * 2' })).toThrow('Unknown template variable: nope');
  });
});

describe('renderTemplate', () => {
  it('should substitute placeholders and split into arguments', () => {
    const args = renderTemplate(
      '-c:v libx264  -b:v {var_minrate}k\t-maxrate {var_maxrate}k -bufsize 1835k',
      { minrate: 4500, maxrate: 5500 }
    );

    expect(args).toEqual(['-c:v', 'libx264', '-b:v', '4500k', '-maxrate', '5500k', '-bufsize', '1835k']);
  });

  it('should reject unknown placeholders', () => {
    expect(() => renderTemplate('-b:v {var_rate}k', {})).toThrow('Unknown template variable: rate');
  });
});
