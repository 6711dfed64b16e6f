/**
 * Centralized error handling utilities
 * Provides consistent error messages for the command line
 */

import type { LogParseError, LogParseErrorCode } from '../analyzers/errors.js';

/**
 * Standard error categories
 */
export enum ErrorCategory {
  FILE_OPERATION = 'File Operation',
  PARSING = 'Parsing',
  CONFIGURATION = 'Configuration',
  VALIDATION = 'Validation',
}

const PARSE_SUGGESTIONS: Record<LogParseErrorCode, string> = {
  MALFORMED_HEADER: `💡 Suggestion: Export the log with the format printed by 'git-log-miner format'.`,
  INVALID_TIMESTAMP: '💡 Suggestion: Use a machine-readable date such as --date=short or --date=iso-strict.',
  MALFORMED_CHANGE: '💡 Suggestion: Change lines must be "<added>\\t<removed>\\t<path>" as printed by --numstat.',
  AMBIGUOUS_BLOCK: '💡 Suggestion: Drop --reject-ambiguous to let consecutive headers share the following changes.',
};

/**
 * Get actionable suggestion based on error type
 */
function getErrorSuggestion(category: ErrorCategory, errorMessage: string): string | null {
  const lowerError = errorMessage.toLowerCase();

  if (category === ErrorCategory.FILE_OPERATION) {
    if (lowerError.includes('enoent') || lowerError.includes('no such file')) {
      return '💡 Suggestion: Check if the file path is correct and the file exists.';
    }
    if (lowerError.includes('eisdir') || lowerError.includes('is a directory')) {
      return '💡 Suggestion: The path points to a directory, not a file. Specify a log file.';
    }
  }

  if (category === ErrorCategory.CONFIGURATION) {
    return '💡 Suggestion: Compare your format file with config-defaults/log-format.yaml.';
  }

  return null;
}

/**
 * Create a standardized error message
 */
export function createErrorMessage(
  category: ErrorCategory,
  operation: string,
  error: unknown,
  options?: {
    filePath?: string;
  }
): string {
  const errorMsg = extractErrorMessage(error);
  const location = options?.filePath ? ` (${options.filePath})` : '';
  const baseMessage = `[${category}] ${operation} failed${location}: ${errorMsg}`;

  const suggestion = getErrorSuggestion(category, errorMsg);
  if (suggestion) {
    return `${baseMessage}\n${suggestion}`;
  }

  return baseMessage;
}

/**
 * Describe a failed parse: code, message, offending line and a hint
 */
export function formatParseFailure(error: LogParseError): string {
  return [
    `[${ErrorCategory.PARSING}] ${error.code}: ${error.message}`,
    `  at line: ${JSON.stringify(error.rawLine)}`,
    PARSE_SUGGESTIONS[error.code],
  ].join('\n');
}

/**
 * Extract error message from unknown error type
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
