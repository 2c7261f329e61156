/**
 * Engine error taxonomy and recovery handling
 * Every rejected operation surfaces as an EngineError carrying a typed code
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  VALIDATION = 'validation',
  AUTHORIZATION = 'authorization',
  LIFECYCLE = 'lifecycle',
  BALANCE = 'balance',
  PROTOCOL = 'protocol',
  SETTLEMENT = 'settlement',
  CONCURRENCY = 'concurrency',
  SYSTEM = 'system'
}

export enum RecoveryStrategy {
  RETRY = 'retry',
  FAIL_FAST = 'fail_fast'
}

export enum EngineErrorCode {
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',
  UNAUTHORIZED = 'UNAUTHORIZED',
  INVALID_STATE = 'INVALID_STATE',
  INSUFFICIENT_COLLATERAL = 'INSUFFICIENT_COLLATERAL',
  INSUFFICIENT_STAKE = 'INSUFFICIENT_STAKE',
  INSUFFICIENT_TREASURY = 'INSUFFICIENT_TREASURY',
  OVER_FILL = 'OVER_FILL',
  ALREADY_COMMITTED = 'ALREADY_COMMITTED',
  HASH_MISMATCH = 'HASH_MISMATCH',
  SETTLEMENT_FAILED = 'SETTLEMENT_FAILED',
  VERSION_CONFLICT = 'VERSION_CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export interface ErrorContext {
  operation: string;
  component: string;
  actor?: string;
  orderId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface RecoveryAction {
  strategy: RecoveryStrategy;
  maxAttempts?: number;
  backoffMs?: number;
}

export type OperationResult<T> =
  | { success: true; result: T; recoveryAttempts: number }
  | { success: false; error: EngineError; recoveryAttempts: number };

/**
 * Application error with recovery context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;
  public readonly technicalMessage: string;
  public readonly suggestedActions: string[];

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
      suggestedActions?: string[];
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.category === ErrorCategory.CONCURRENCY;
    this.technicalMessage = message;
    this.userMessage = options.userMessage ?? this.generateUserMessage();
    this.suggestedActions = options.suggestedActions ?? this.generateSuggestedActions();
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.VALIDATION:
        return 'Invalid input provided. Please check the order terms and try again.';
      case ErrorCategory.AUTHORIZATION:
        return 'You are not permitted to perform this operation.';
      case ErrorCategory.LIFECYCLE:
        return 'The order is not in a state that allows this operation.';
      case ErrorCategory.BALANCE:
        return 'The account balance does not cover this operation.';
      case ErrorCategory.PROTOCOL:
        return 'The commitment could not be used for this order.';
      case ErrorCategory.SETTLEMENT:
        return 'Settlement was aborted and no balances were moved.';
      case ErrorCategory.CONCURRENCY:
        return 'The order changed while the operation was running. Please try again.';
      default:
        return 'An unexpected error occurred. Please try again or contact support.';
    }
  }

  private generateSuggestedActions(): string[] {
    switch (this.category) {
      case ErrorCategory.VALIDATION:
        return ['Check that price and quantity are positive', 'Check that the deadline is in the future'];
      case ErrorCategory.AUTHORIZATION:
        return ['Sign with the order owner, an eligible approver or a governance account'];
      case ErrorCategory.LIFECYCLE:
        return ['Refresh the order and check its status and deadline'];
      case ErrorCategory.BALANCE:
        return ['Top up the account or reduce the amount'];
      case ErrorCategory.PROTOCOL:
        return ['Recompute the commitment hash from the exact terms and nonce', 'Commit again if the reveal was consumed'];
      case ErrorCategory.SETTLEMENT:
        return ['Check the taker balance and retry the fill'];
      default:
        return ['Try the operation again'];
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage,
      technicalMessage: this.technicalMessage,
      suggestedActions: this.suggestedActions
    };
  }
}

const CODE_CATEGORY: Record<EngineErrorCode, ErrorCategory> = {
  [EngineErrorCode.INVALID_PARAMETERS]: ErrorCategory.VALIDATION,
  [EngineErrorCode.UNAUTHORIZED]: ErrorCategory.AUTHORIZATION,
  [EngineErrorCode.INVALID_STATE]: ErrorCategory.LIFECYCLE,
  [EngineErrorCode.INSUFFICIENT_COLLATERAL]: ErrorCategory.BALANCE,
  [EngineErrorCode.INSUFFICIENT_STAKE]: ErrorCategory.BALANCE,
  [EngineErrorCode.INSUFFICIENT_TREASURY]: ErrorCategory.BALANCE,
  [EngineErrorCode.OVER_FILL]: ErrorCategory.LIFECYCLE,
  [EngineErrorCode.ALREADY_COMMITTED]: ErrorCategory.PROTOCOL,
  [EngineErrorCode.HASH_MISMATCH]: ErrorCategory.PROTOCOL,
  [EngineErrorCode.SETTLEMENT_FAILED]: ErrorCategory.SETTLEMENT,
  [EngineErrorCode.VERSION_CONFLICT]: ErrorCategory.CONCURRENCY,
  [EngineErrorCode.INTERNAL_ERROR]: ErrorCategory.SYSTEM
};

const CODE_SEVERITY: Partial<Record<EngineErrorCode, ErrorSeverity>> = {
  [EngineErrorCode.INVALID_PARAMETERS]: ErrorSeverity.LOW,
  [EngineErrorCode.UNAUTHORIZED]: ErrorSeverity.HIGH,
  [EngineErrorCode.HASH_MISMATCH]: ErrorSeverity.HIGH,
  [EngineErrorCode.SETTLEMENT_FAILED]: ErrorSeverity.HIGH,
  [EngineErrorCode.INTERNAL_ERROR]: ErrorSeverity.CRITICAL
};

/**
 * Typed engine error. No state change accompanies any of these except the
 * destructive reveal rule.
 */
export class EngineError extends ApplicationError {
  public readonly code: EngineErrorCode;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Omit<ErrorContext, 'timestamp'> & { timestamp?: Date },
    originalError?: Error
  ) {
    super(
      message,
      code,
      CODE_CATEGORY[code],
      CODE_SEVERITY[code] ?? ErrorSeverity.MEDIUM,
      { ...context, timestamp: context.timestamp ?? new Date() },
      { originalError }
    );
    this.name = 'EngineError';
    this.code = code;
  }
}

export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineError {
  return error instanceof EngineError && (code === undefined || error.code === code);
}

/**
 * Runs engine operations, retrying only retryable failures
 */
export class ErrorHandler {
  private recoveryStrategies: Map<string, RecoveryAction> = new Map();
  private errorMetrics: Map<string, { count: number; lastOccurrence: Date }> = new Map();

  constructor(private readonly defaultMaxAttempts: number = 3) {}

  async handleError<T>(
    operation: () => Promise<T>,
    context: ErrorContext,
    recoveryAction?: RecoveryAction
  ): Promise<OperationResult<T>> {
    const strategy = recoveryAction ?? this.getRecoveryStrategy(context.operation);
    const maxAttempts = strategy.maxAttempts ?? this.defaultMaxAttempts;
    let recoveryAttempts = 0;

    for (;;) {
      try {
        const result = await operation();
        return { success: true, result, recoveryAttempts };
      } catch (error) {
        const wrapped = this.wrapError(error, context);
        this.recordErrorMetrics(wrapped);

        const canRetry =
          strategy.strategy === RecoveryStrategy.RETRY &&
          wrapped.isRetryable &&
          recoveryAttempts < maxAttempts;
        if (!canRetry) {
          return { success: false, error: wrapped, recoveryAttempts };
        }

        recoveryAttempts++;
        if (strategy.backoffMs) {
          await this.sleep(this.calculateBackoffDelay(recoveryAttempts, strategy.backoffMs));
        }
      }
    }
  }

  private wrapError(error: unknown, context: ErrorContext): EngineError {
    if (error instanceof EngineError) {
      return error;
    }

    return new EngineError(
      EngineErrorCode.INTERNAL_ERROR,
      error instanceof Error ? error.message : String(error),
      context,
      error instanceof Error ? error : undefined
    );
  }

  private calculateBackoffDelay(attempt: number, baseDelay: number): number {
    const maxDelay = 1000;
    return Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private getRecoveryStrategy(operation: string): RecoveryAction {
    return this.recoveryStrategies.get(operation) ?? {
      strategy: RecoveryStrategy.RETRY,
      maxAttempts: this.defaultMaxAttempts
    };
  }

  private recordErrorMetrics(error: EngineError): void {
    const key = `${error.category}:${error.code}`;
    const existing = this.errorMetrics.get(key) ?? { count: 0, lastOccurrence: new Date() };

    this.errorMetrics.set(key, {
      count: existing.count + 1,
      lastOccurrence: new Date()
    });
  }

  /**
   * Registers a custom recovery strategy for an operation
   */
  registerRecoveryStrategy(operation: string, action: RecoveryAction): void {
    this.recoveryStrategies.set(operation, action);
  }

  getErrorMetrics(): Map<string, { count: number; lastOccurrence: Date }> {
    return new Map(this.errorMetrics);
  }
}
