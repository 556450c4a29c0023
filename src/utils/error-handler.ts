/**
 * Standardized error reporting for the property graph
 *
 * Gives rejected operations a category and severity, logs them in one
 * format and counts how often each message occurs. Counters belong to the
 * handler instance; each graph owns its own handler.
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  LOOKUP = 'lookup',
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
  recoveryHint?: string;
}

export interface ErrorResult {
  success: false;
  error: ErrorInfo;
}

export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Combined result type for fallible operations
 */
export type OperationResult<T> = SuccessResult<T> | ErrorResult;

export class ErrorHandler {
  private errorCounts = new Map<string, number>();

  constructor(private readonly frequentErrorThreshold: number = 5) {}

  /**
   * Handle an error with categorization and logging
   */
  handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  createErrorResult(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorResult {
    const error = this.handle(category, severity, message, originalError, context, recoveryHint);

    return {
      success: false,
      error
    };
  }

  createSuccessResult<T>(data: T): SuccessResult<T> {
    return {
      success: true,
      data
    };
  }

  /**
   * Run a synchronous operation and turn a thrown error into an ErrorResult
   */
  attempt<T>(
    operation: () => T,
    category: ErrorCategory,
    operationName: string,
    context?: Record<string, unknown>
  ): OperationResult<T> {
    try {
      return this.createSuccessResult(operation());
    } catch (error) {
      return this.createErrorResult(
        category,
        ErrorSeverity.MEDIUM,
        `Failed to ${operationName}`,
        error instanceof Error ? error : new Error(String(error)),
        context,
        `Check the ${category} inputs and call again`
      );
    }
  }

  private logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);
    const timestamp = errorInfo.timestamp.toISOString();

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${timestamp}`,
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : '',
      errorInfo.recoveryHint ? `   💡 Hint: ${errorInfo.recoveryHint}` : '',
      errorInfo.originalError ? `   Original: ${errorInfo.originalError.message}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.HIGH) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  private trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) ?? 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount >= this.frequentErrorThreshold) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '⚠️';
      case ErrorSeverity.MEDIUM: return '⚡';
      case ErrorSeverity.LOW: return 'ℹ️';
    }
  }

  /**
   * Get error statistics for monitoring
   */
  getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  resetErrorStats(): void {
    this.errorCounts.clear();
  }
}
