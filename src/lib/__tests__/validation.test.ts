import { z } from 'zod';
import { BadRequestError, ValidationError } from '../errors';
import {
  INTEGER_MESSAGE,
  REQUIRED_MESSAGE,
  parsePathId,
  parseWith,
  primaryKey,
  requirePathId,
  wholeNumber,
} from '../validation';

function errorsOf(fn: () => unknown): Record<string, string[]> {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.fields;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('validation', () => {
  describe('wholeNumber', () => {
    const schema = z.object({ quantity: wholeNumber });

    test('accepts integers and digit strings', () => {
      expect(parseWith(schema, { quantity: 3 })).toEqual({ quantity: 3 });
      expect(parseWith(schema, { quantity: '7' })).toEqual({ quantity: 7 });
      expect(parseWith(schema, { quantity: 2.0 })).toEqual({ quantity: 2 });
    });

    test.each([[1.5], ['1.5'], ['abc'], [true], [[1]]])('rejects %p', (quantity) => {
      expect(errorsOf(() => parseWith(schema, { quantity }))).toEqual({ quantity: [INTEGER_MESSAGE] });
    });

    test('reports a missing value as required', () => {
      expect(errorsOf(() => parseWith(schema, {}))).toEqual({ quantity: [REQUIRED_MESSAGE] });
    });
  });

  describe('primaryKey', () => {
    const schema = z.object({ menuitem: primaryKey });

    test('truncates fractional ids', () => {
      expect(parseWith(schema, { menuitem: 4.9 })).toEqual({ menuitem: 4 });
    });

    test('rejects non-numeric ids with the received type', () => {
      expect(errorsOf(() => parseWith(schema, { menuitem: 'pizza' }))).toEqual({
        menuitem: ['Incorrect type. Expected pk value, received string.'],
      });
      expect(errorsOf(() => parseWith(schema, { menuitem: [1] }))).toEqual({
        menuitem: ['Incorrect type. Expected pk value, received list.'],
      });
    });
  });

  test('parseWith names unknown keys of a strict object', () => {
    const schema = z.object({ a: z.string() }).strict();
    expect(errorsOf(() => parseWith(schema, { a: 'x', b: 1 }))).toEqual({ b: ['This field is not allowed.'] });
  });

  test('parseWith treats a missing body as an empty object', () => {
    const schema = z.object({ a: z.string() });
    expect(errorsOf(() => parseWith(schema, undefined))).toEqual({ a: [REQUIRED_MESSAGE] });
  });

  describe('path ids', () => {
    test('parsePathId accepts digits only', () => {
      expect(parsePathId('42')).toBe(42);
      expect(parsePathId('4.2')).toBeNull();
      expect(parsePathId('abc')).toBeNull();
      expect(parsePathId('-1')).toBeNull();
    });

    test('requirePathId throws a 400 naming the resource', () => {
      expect(() => requirePathId('x', 'cart item')).toThrow(new BadRequestError('Invalid cart item ID format: x'));
    });
  });
});
