/**
 * Tests for rule-based input validation
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { InputValidator } from './InputValidator';
import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';

const NOW = Date.UTC(2025, 0, 1);

function terms(overrides: Partial<Parameters<InputValidator['validateOrderTerms']>[0]> = {}) {
  return {
    owner: 'maker:alice',
    price: 10n,
    quantity: 5n,
    ttl: NOW + 1,
    isMultisig: false,
    threshold: 0,
    ...overrides
  };
}

describe('InputValidator', () => {
  const validator = new InputValidator();

  it('accepts well-formed order terms', () => {
    expect(validator.validateOrderTerms(terms({ orderId: 'ord-1' }), NOW, 16)).toEqual({ isValid: true, errors: [] });
  });

  it('reports every failed field with a code', () => {
    const result = validator.validateOrderTerms(terms({ owner: '', price: 0n, ttl: NOW }), NOW, 16);

    expect(result.errors.map(error => [error.field, error.code])).toEqual([
      ['owner', 'REQUIRED_FIELD'],
      ['price', 'MIN_VALUE'],
      ['ttl', 'MIN_VALUE']
    ]);
  });

  it('bounds multisig thresholds', () => {
    expect(validator.validateOrderTerms(terms({ isMultisig: true, threshold: 16 }), NOW, 16).isValid).toBe(true);
    expect(validator.validateOrderTerms(terms({ isMultisig: true, threshold: 17 }), NOW, 16).errors[0]).toEqual({
      field: 'threshold',
      message: 'Multisig threshold must be between 1 and 16',
      code: 'MAX_VALUE'
    });
    expect(validator.validateOrderTerms(terms({ threshold: 2 }), NOW, 16).errors[0].message).toBe(
      'Threshold must be 0 for orders without multisig'
    );
  });

  it('checks types before ranges', () => {
    const result = validator.validate({ amount: 5 }, [validator.positiveAmountRule('amount')]);

    expect(result.errors).toEqual([
      { field: 'amount', message: "Field 'amount' must be of type bigint", code: 'INVALID_TYPE' }
    ]);
  });

  it('rejects fields no rule expects', () => {
    const result = validator.validate({ orderId: 'ord-1', extra: true }, [validator.orderIdRule()]);

    expect(result.errors).toEqual([{ field: 'extra', message: 'Unexpected field in input data', code: 'UNEXPECTED_FIELD' }]);
  });

  it('throws INVALID_PARAMETERS joining every message', () => {
    const result = validator.validate({ trader: 'bad trader' }, [validator.identityRule('trader')]);

    try {
      validator.assertValid(result, { operation: 'stakeTokens', component: 'test' });
      expect.fail('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(EngineError);
      if (error instanceof EngineError) {
        expect(error.code).toBe(EngineErrorCode.INVALID_PARAMETERS);
        expect(error.message).toBe("Field 'trader' has invalid format");
        expect(error.context.metadata).toEqual({ fields: ['trader'] });
      }
    }
  });

  /**
   * **Feature: otc-limit-engine, Property 8: Identities are bounded and printable**
   */
  it('should accept exactly the identities matching the identity pattern', () => {
    fc.assert(fc.property(fc.string({ maxLength: 140 }), identity => {
      const result = validator.validate({ identity }, [validator.identityRule('identity')]);

      expect(result.isValid).toBe(/^[A-Za-z0-9:_.\-]{1,128}$/.test(identity));
    }), { numRuns: 100 });
  });
});
