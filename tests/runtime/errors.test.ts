/**
 * Error registry, message rendering and error classes
 */

import { describe, expect, it } from 'vitest';
import {
  AccessError,
  createError,
  ERROR_REGISTRY,
  evaluate,
  pipe,
  renderMessage,
  RestructError,
  StructuralTypeError,
} from '../../src/index.js';

describe('ERROR_REGISTRY', () => {
  it('indexes every definition by id', () => {
    expect(ERROR_REGISTRY.size).toBe(11);
    expect(ERROR_REGISTRY.has('RS-R001')).toBe(true);
    expect(ERROR_REGISTRY.get('RS-C001')?.category).toBe('config');
    expect(ERROR_REGISTRY.get('RS-X999')).toBeUndefined();
  });

  it('uses the category letter in every id', () => {
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      const letter = definition.category === 'runtime' ? 'R' : 'C';
      expect(id).toMatch(new RegExp(`^RS-${letter}\\d{3}$`));
    }
  });
});

describe('renderMessage', () => {
  it('replaces placeholders with context values', () => {
    expect(
      renderMessage('Expected {expected}, got {actual}', {
        expected: 'string',
        actual: 'number',
      })
    ).toBe('Expected string, got number');
  });

  it('replaces repeated placeholders', () => {
    expect(renderMessage('{name} and {name}', { name: 'a' })).toBe('a and a');
  });

  it('renders missing values as empty strings', () => {
    expect(renderMessage('Hello {name}, welcome!', {})).toBe('Hello , welcome!');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('index {index}', { index: 3 })).toBe('index 3');
  });

  it('returns templates with unclosed braces unchanged', () => {
    expect(renderMessage('Hello {name', { name: 'x' })).toBe('Hello {name');
  });
});

describe('createError', () => {
  it('builds a RestructError from the registry', () => {
    const error = createError('RS-R006', { count: 2, at: '' });
    expect(error).toBeInstanceOf(RestructError);
    expect(error.errorId).toBe('RS-R006');
    expect(error.message).toBe('sequence template must contain exactly one subspec, got 2');
    expect(error.format()).toBe(
      'RestructError: sequence template must contain exactly one subspec, got 2'
    );
  });

  it('rejects unknown ids', () => {
    expect(() => createError('RS-X999', {})).toThrow('Unknown error ID: RS-X999');
  });
});

describe('RestructError', () => {
  it('rejects ids outside the registry', () => {
    expect(() => new RestructError({ errorId: 'RS-X999', message: 'm' })).toThrow(TypeError);
  });

  it('checks the category of structural errors', () => {
    expect(() => new StructuralTypeError('RS-C001', {})).toThrow(
      'Expected runtime error ID, got: RS-C001'
    );
  });

  it('exposes structured data with the evaluation path', () => {
    try {
      evaluate({ items: [{}] }, pipe('items', ['a']));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(AccessError);
      if (error instanceof AccessError) {
        const data = error.toData();
        expect(data.errorId).toBe('RS-R001');
        expect(data.path).toEqual(['items', 0]);
        expect(data.context).toEqual({
          segment: '"a"',
          index: 2,
          path: 'Path("items", 0, "a")',
          error: 'KeyNotFoundError("key not found: \\"a\\"")',
        });
        expect(error.format()).toBe(
          'AccessError: could not access "a", index 2 in path Path("items", 0, "a"), got error: KeyNotFoundError("key not found: \\"a\\"")'
        );
        expect(error.format((d) => `[${d.errorId}] ${d.path?.join('/') ?? ''}`)).toBe(
          '[RS-R001] items/0'
        );
      }
    }
  });

  it('keeps the low-level failure as the cause', () => {
    try {
      evaluate({}, 'a');
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(AccessError);
      if (error instanceof AccessError) {
        expect(error.cause).toBeInstanceOf(Error);
        expect(error.name).toBe('AccessError');
      }
    }
  });
});
