/**
 * Rule-based validation of engine inputs
 */

import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';
import type { ErrorContext } from '../utils/ErrorHandler';

export interface ValidationRule {
  field: string;
  required?: boolean;
  type?: 'string' | 'number' | 'bigint' | 'boolean';
  min?: number | bigint;
  max?: number | bigint;
  integer?: boolean;
  pattern?: RegExp;
  message?: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  field: string;
  message: string;
  code: string;
}

export class InputValidator {
  static readonly COMMON_PATTERNS = {
    IDENTITY: /^[A-Za-z0-9:_.\-]{1,128}$/,
    ORDER_ID: /^[A-Za-z0-9_\-]{1,100}$/,
    COMMIT_HASH: /^[0-9a-f]{64}$/
  };

  /**
   * Validates input data against provided rules
   */
  validate(data: Record<string, unknown>, rules: ValidationRule[]): ValidationResult {
    const errors: ValidationError[] = [];

    for (const rule of rules) {
      errors.push(...this.validateField(rule.field, data[rule.field], rule));
    }

    // Unexpected fields are rejected rather than ignored
    const expectedFields = new Set(rules.map(rule => rule.field));
    for (const field of Object.keys(data)) {
      if (!expectedFields.has(field)) {
        errors.push({
          field,
          message: 'Unexpected field in input data',
          code: 'UNEXPECTED_FIELD'
        });
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  /**
   * Throws INVALID_PARAMETERS carrying every failed rule
   */
  assertValid(result: ValidationResult, context: Omit<ErrorContext, 'timestamp'>): void {
    if (result.isValid) return;

    throw new EngineError(
      EngineErrorCode.INVALID_PARAMETERS,
      result.errors.map(error => error.message).join('; '),
      { ...context, metadata: { ...context.metadata, fields: result.errors.map(error => error.field) } }
    );
  }

  identityRule(field: string): ValidationRule {
    return { field, required: true, type: 'string', pattern: InputValidator.COMMON_PATTERNS.IDENTITY };
  }

  orderIdRule(field: string = 'orderId', required: boolean = true): ValidationRule {
    return { field, required, type: 'string', pattern: InputValidator.COMMON_PATTERNS.ORDER_ID };
  }

  positiveAmountRule(field: string): ValidationRule {
    return { field, required: true, type: 'bigint', min: 1n, message: `Field '${field}' must be greater than zero` };
  }

  /**
   * Validates order terms at creation or reveal
   */
  validateOrderTerms(
    input: {
      owner: string;
      orderId?: string;
      price: bigint;
      quantity: bigint;
      ttl: number;
      isMultisig: boolean;
      threshold: number;
    },
    now: number,
    maxThreshold: number
  ): ValidationResult {
    const rules: ValidationRule[] = [
      this.identityRule('owner'),
      this.orderIdRule('orderId', false),
      this.positiveAmountRule('price'),
      this.positiveAmountRule('quantity'),
      {
        field: 'ttl',
        required: true,
        type: 'number',
        integer: true,
        min: now + 1,
        message: 'TTL must be a deadline after the current time'
      },
      { field: 'isMultisig', required: true, type: 'boolean' },
      {
        field: 'threshold',
        required: true,
        type: 'number',
        integer: true,
        min: input.isMultisig ? 1 : 0,
        max: input.isMultisig ? maxThreshold : 0,
        message: input.isMultisig
          ? `Multisig threshold must be between 1 and ${maxThreshold}`
          : 'Threshold must be 0 for orders without multisig'
      }
    ];

    return this.validate({ ...input }, rules);
  }

  private validateField(fieldName: string, value: unknown, rule: ValidationRule): ValidationError[] {
    const errors: ValidationError[] = [];

    if (value === undefined || value === null || value === '') {
      if (rule.required) {
        errors.push({
          field: fieldName,
          message: `Field '${fieldName}' is required`,
          code: 'REQUIRED_FIELD'
        });
      }
      return errors;
    }

    if (rule.type && !this.validateType(value, rule.type)) {
      errors.push({
        field: fieldName,
        message: `Field '${fieldName}' must be of type ${rule.type}`,
        code: 'INVALID_TYPE'
      });
      return errors;
    }

    if (typeof value === 'string') {
      if (rule.pattern && !rule.pattern.test(value)) {
        errors.push({
          field: fieldName,
          message: rule.message ?? `Field '${fieldName}' has invalid format`,
          code: 'INVALID_FORMAT'
        });
      }
    }

    if (typeof value === 'number' || typeof value === 'bigint') {
      if (rule.integer && typeof value === 'number' && !Number.isInteger(value)) {
        errors.push({
          field: fieldName,
          message: rule.message ?? `Field '${fieldName}' must be an integer`,
          code: 'NOT_INTEGER'
        });
      }

      if (rule.min !== undefined && value < rule.min) {
        errors.push({
          field: fieldName,
          message: rule.message ?? `Field '${fieldName}' must be at least ${rule.min}`,
          code: 'MIN_VALUE'
        });
      }

      if (rule.max !== undefined && value > rule.max) {
        errors.push({
          field: fieldName,
          message: rule.message ?? `Field '${fieldName}' must be at most ${rule.max}`,
          code: 'MAX_VALUE'
        });
      }
    }

    return errors;
  }

  private validateType(value: unknown, expectedType: NonNullable<ValidationRule['type']>): boolean {
    switch (expectedType) {
      case 'string':
        return typeof value === 'string';
      case 'number':
        return typeof value === 'number' && !isNaN(value);
      case 'bigint':
        return typeof value === 'bigint';
      case 'boolean':
        return typeof value === 'boolean';
    }
  }
}
