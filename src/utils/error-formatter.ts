/**
 * Error formatting utilities for user-friendly error messages
 */

interface FormattedError {
  message: string;
  suggestion?: string;
  technical?: string;
}

/**
 * Format error for user display with context and suggestions
 */
export function formatUserError(error: unknown, context: string): string {
  const formatted = parseError(error, context);

  let message = formatted.message;

  if (formatted.suggestion) {
    message += ` | Suggestion: ${formatted.suggestion}`;
  }

  if (formatted.technical) {
    message += ` | Technical: ${formatted.technical}`;
  }

  return message;
}

/**
 * Short reason for a failed read or write of a catalog file
 * e.g. "permission denied", "invalid JSON: Unexpected end of JSON input"
 */
export function describeFileError(error: unknown): string {
  const code = getErrorCode(error);

  if (error instanceof SyntaxError) {
    return `invalid JSON: ${shortenMessage(firstLine(error.message))}`;
  }

  switch (code) {
    case 'ENOENT':
      return 'file or directory not found';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EISDIR':
      return 'path is a directory';
    case 'ENOTDIR':
      return 'a parent path is not a directory';
    case 'ENOSPC':
      return 'no space left on device';
    case 'EROFS':
      return 'file system is read-only';
  }

  return shortenMessage(firstLine(errorMessage(error)));
}

/**
 * Parse error and provide user-friendly message with context
 */
function parseError(error: unknown, context: string): FormattedError {
  const code = getErrorCode(error);

  if (error instanceof SyntaxError) {
    return {
      message: `Catalog file is not valid JSON while ${context}`,
      suggestion: 'Fix the file by hand, or move it away to start with an empty catalog.',
      technical: extractTechnicalDetails(errorMessage(error))
    };
  }

  if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
    return {
      message: `Permission denied while ${context}`,
      suggestion: 'Check that the catalog file and its directory are writable.',
      technical: code
    };
  }

  if (code === 'ENOSPC') {
    return {
      message: `Disk full while ${context}`,
      suggestion: 'Free some disk space and save again.',
      technical: code
    };
  }

  if (code === 'EADDRINUSE') {
    return {
      message: `Port already in use while ${context}`,
      suggestion: 'Stop the other process or set WEB_UI_PORT to a free port.',
      technical: extractTechnicalDetails(errorMessage(error))
    };
  }

  // Generic error
  return {
    message: `Error ${context}: ${shortenMessage(firstLine(errorMessage(error)))}`,
    suggestion: 'Check logs for details.',
    technical: undefined
  };
}

function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function firstLine(msg: string): string {
  return msg.split('\n')[0] ?? msg;
}

/**
 * Extract technical details without full stack trace
 */
function extractTechnicalDetails(errorStr: string): string | undefined {
  const cleaned = firstLine(errorStr);
  return cleaned ? shortenMessage(cleaned) : undefined;
}

/**
 * Shorten long error messages
 */
function shortenMessage(msg: string): string {
  const maxLength = 150;
  if (msg.length <= maxLength) {
    return msg;
  }
  return msg.substring(0, maxLength) + '...';
}
