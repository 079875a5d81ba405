/**
 * Error taxonomy for the orchestrator
 */

export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  CONFIG_INVALID = 'CONFIG_INVALID',
  AGENT_TIMEOUT = 'AGENT_TIMEOUT',
  AGENT_TRANSPORT = 'AGENT_TRANSPORT',
  AGENT_MALFORMED = 'AGENT_MALFORMED',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  STORE_FAILURE = 'STORE_FAILURE',
  FETCH_FAILED = 'FETCH_FAILED',
  NOT_FOUND = 'NOT_FOUND',
}

export class OrchestratorError extends Error {
  code: ErrorCode;
  retryable: boolean;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OrchestratorError';
    this.code = code;
    this.retryable = retryable;
    this.context = context;
  }
}

export function isOrchestratorError(err: unknown, code?: ErrorCode): err is OrchestratorError {
  return err instanceof OrchestratorError && (code === undefined || err.code === code);
}

/** HTTP statuses worth another attempt against an external provider. */
export const RETRYABLE_HTTP_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/**
 * Safely extract error message without exposing secrets
 */
export function safeErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    let msg = err.message;
    msg = msg.replace(/token[=:]\s*[\w-]+/gi, 'token=***');
    msg = msg.replace(/password[=:]\s*[^\s]+/gi, 'password=***');
    msg = msg.replace(/api[_-]?key[=:]\s*[\w-]+/gi, 'api_key=***');
    msg = msg.replace(/Bearer\s+[\w.-]+/g, 'Bearer ***');
    if (msg.length > 500) {
      msg = msg.substring(0, 500) + '...';
    }
    return msg;
  }
  return String(err);
}

/**
 * Redact the password of a connection URL for logging
 */
export function redactUrl(url: string | undefined): string {
  if (!url) return 'unknown';
  try {
    const urlObj = new URL(url);
    if (urlObj.password) {
      urlObj.password = '***';
    }
    return urlObj.toString();
  } catch {
    return url.replace(/:[^:@/]+@/, ':***@');
  }
}
