/**
 * Error formatting utilities for user-friendly error messages
 */

import {
  AuthExpiredError,
  AuthTransientError,
  AuthorizationRequiredError,
  ConfigError,
  PartialAppendError,
  SourceApiError,
  SourceNotFoundError,
  TargetApiError
} from '../errors.js';

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
 * Parse error and provide user-friendly message with context
 */
function parseError(error: unknown, context: string): FormattedError {
  const errorStr = error instanceof Error ? error.message : String(error);

  if (error instanceof AuthExpiredError) {
    return {
      message: `Spotify authorization expired while ${context}`,
      suggestion: 'Run `playlist-bridge auth` to authorize again.',
      technical: shortenMessage(errorStr)
    };
  }

  if (error instanceof AuthorizationRequiredError) {
    return {
      message: `Spotify authorization required while ${context}`,
      suggestion: 'Run `playlist-bridge auth` and approve access in the browser.',
      technical: shortenMessage(errorStr)
    };
  }

  if (error instanceof AuthTransientError) {
    return {
      message: `Spotify accounts service unavailable while ${context}`,
      suggestion: 'Check your network connection and try again in a few minutes.',
      technical: shortenMessage(errorStr)
    };
  }

  if (error instanceof ConfigError) {
    return {
      message: `Invalid configuration while ${context}: ${shortenMessage(errorStr)}`,
      suggestion: 'Fix migration.config.json (see config/migration.config.example.json).'
    };
  }

  if (error instanceof SourceNotFoundError) {
    return {
      message: `NetEase playlist ${error.playlistId} not found while ${context}`,
      suggestion: 'Check the playlist id in netease_playlists and that the playlist is public.'
    };
  }

  if (error instanceof PartialAppendError) {
    return {
      message: `Playlist only partially filled while ${context} (${error.appended} of ${error.total} tracks)`,
      suggestion: 'The created playlist was kept. Re-run into a fresh playlist or add the remaining tracks manually.',
      technical: error.cause instanceof Error ? shortenMessage(error.cause.message) : undefined
    };
  }

  if ((error instanceof TargetApiError || error instanceof SourceApiError) && error.status === 429) {
    return {
      message: `Rate limited while ${context}`,
      suggestion: 'API rate limit reached. Wait a few minutes before retrying.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  if (error instanceof TargetApiError && (error.status === 401 || error.status === 403)) {
    return {
      message: `Spotify rejected the request while ${context}`,
      suggestion: 'The token may lack a scope. Run `playlist-bridge auth` to authorize again.',
      technical: `HTTP ${error.status}`
    };
  }

  // Timeout errors
  if (errorStr.includes('timeout') || errorStr.includes('TimeoutError')) {
    return {
      message: `Request timed out while ${context}`,
      suggestion: 'The service may be slow or unreachable. Try again in a few minutes or raise HTTP_TIMEOUT.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  // Network errors
  if (errorStr.includes('ENOTFOUND') || errorStr.includes('getaddrinfo') || errorStr.includes('ECONNREFUSED')) {
    return {
      message: `Network error while ${context}`,
      suggestion: 'Check your internet connection and DNS resolution.',
      technical: extractUrl(errorStr) ?? extractTechnicalDetails(errorStr)
    };
  }

  // Generic error
  return {
    message: `Error ${context}: ${shortenMessage(errorStr)}`,
    suggestion: 'Check logs for details.',
    technical: undefined
  };
}

/**
 * Extract request URL from error message
 */
function extractUrl(errorStr: string): string | undefined {
  const urlMatch = errorStr.match(/https?:\/\/[^\s"]+/);
  if (urlMatch) {
    // Truncate query params for readability
    const url = urlMatch[0];
    const baseUrl = url.split('?')[0];
    return url.length > 80 ? baseUrl : url;
  }
  return undefined;
}

/**
 * Extract technical details without full stack trace
 */
function extractTechnicalDetails(errorStr: string): string | undefined {
  const cleaned = errorStr.split('\n')[0];

  const match = cleaned.match(/\[(\w+Error)\]:\s*(.+?)(?:\s*at\s|$)/);
  if (match) {
    return `${match[1]}: ${shortenMessage(match[2])}`;
  }

  return shortenMessage(cleaned);
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
