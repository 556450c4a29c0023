/**
 * Graph configuration defaults and validation
 */

import type { GraphConfig } from './types.js';
import { InvalidConfigurationError } from './errors.js';
import { ErrorCategory, ErrorSeverity, type ErrorHandler } from '../utils/error-handler.js';

/**
 * Create the default graph configuration
 */
export function createDefaultGraphConfig(): GraphConfig {
  return {
    enableHistory: true,
    historyLimit: 1000,
    reportErrors: true
  };
}

/**
 * Validate a graph configuration
 */
export function validateGraphConfig(config: GraphConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.historyLimit) || config.historyLimit <= 0) {
    errors.push('History limit must be a positive integer');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Merge overrides onto the defaults and validate the result
 *
 * A rejected configuration is reported through `errorHandler`, when one is
 * given and the overrides leave `reportErrors` on, before it is thrown.
 */
export function resolveGraphConfig(
  overrides: Partial<GraphConfig> = {},
  errorHandler?: ErrorHandler
): GraphConfig {
  const defaults = createDefaultGraphConfig();
  const config: GraphConfig = {
    enableHistory: overrides.enableHistory ?? defaults.enableHistory,
    historyLimit: overrides.historyLimit ?? defaults.historyLimit,
    reportErrors: overrides.reportErrors ?? defaults.reportErrors
  };

  const validation = validateGraphConfig(config);
  if (!validation.valid) {
    const error = new InvalidConfigurationError(validation.errors);
    if (errorHandler && config.reportErrors) {
      errorHandler.handle(
        ErrorCategory.CONFIGURATION,
        ErrorSeverity.MEDIUM,
        'Rejected graph configuration',
        error,
        { errors: validation.errors },
        'Pass a positive integer historyLimit'
      );
    }
    throw error;
  }

  return config;
}
