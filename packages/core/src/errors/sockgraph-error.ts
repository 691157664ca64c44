/**
 * Structured errors for the outer surfaces (CLI arguments, MCP tool
 * arguments, rule-file checks). The scan pipeline itself never throws
 * these; it degrades to empty results and diagnostics instead.
 */

export enum SockgraphErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  RULESET_INVALID = 'RULESET_INVALID',
  PROCESS_NOT_FOUND = 'PROCESS_NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface RecoveryHint {
  suggestion: string;
  command?: string;
  alternativeTools?: string[];
}

export interface SockgraphErrorDetails {
  code: SockgraphErrorCode;
  message: string;
  details?: Record<string, unknown> | undefined;
  recovery?: RecoveryHint | undefined;
}

export class SockgraphError extends Error {
  public readonly code: SockgraphErrorCode;
  public readonly details?: Record<string, unknown> | undefined;
  public readonly recovery?: RecoveryHint | undefined;

  constructor(errorDetails: SockgraphErrorDetails) {
    super(errorDetails.message);
    this.name = 'SockgraphError';
    this.code = errorDetails.code;
    this.details = errorDetails.details;
    this.recovery = errorDetails.recovery;
  }

  /**
   * Convert to MCP error response format
   */
  toMCPResponse(requestId?: string): {
    content: Array<{ type: 'text'; text: string }>;
    isError: true;
  } {
    const errorResponse = {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        recovery: this.recovery,
      },
      meta: {
        requestId: requestId ?? `err_${Date.now().toString(36)}`,
        timestamp: new Date().toISOString(),
      },
    };

    return {
      content: [{
        type: 'text',
        text: JSON.stringify(errorResponse, null, 2),
      }],
      isError: true,
    };
  }
}

/**
 * A problem found while loading configuration or rules. Reported next to
 * the usable fallback value rather than thrown.
 */
export interface Diagnostic {
  readonly source: string;
  readonly message: string;
}

/**
 * One-line description of a filesystem error, prefixed with its errno code
 */
export function describeFsError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

/**
 * Error factory functions for common errors
 */
export const Errors = {
  invalidArgument(param: string, reason: string, suggestion?: string): SockgraphError {
    return new SockgraphError({
      code: SockgraphErrorCode.INVALID_ARGUMENT,
      message: `Invalid argument '${param}': ${reason}`,
      details: { param, reason },
      recovery: suggestion ? { suggestion } : undefined,
    });
  },

  invalidRuleSet(source: string, diagnostics: readonly Diagnostic[]): SockgraphError {
    return new SockgraphError({
      code: SockgraphErrorCode.RULESET_INVALID,
      message: `Rule set ${source} is invalid (${diagnostics.length} problem${diagnostics.length === 1 ? '' : 's'})`,
      details: { source, problems: diagnostics.map((d) => d.message) },
      recovery: {
        suggestion: 'Fix the listed problems and re-run the check',
        command: `sockgraph rules check ${source}`,
      },
    });
  },

  processNotFound(pid: number): SockgraphError {
    return new SockgraphError({
      code: SockgraphErrorCode.PROCESS_NOT_FOUND,
      message: `No visible sockets owned by pid ${pid}`,
      details: { pid },
      recovery: {
        suggestion: 'The process may have exited, or its descriptors are not readable without elevated privileges',
        alternativeTools: ['sockgraph_processes'],
      },
    });
  },

  internal(message: string, details?: Record<string, unknown>): SockgraphError {
    return new SockgraphError({
      code: SockgraphErrorCode.INTERNAL_ERROR,
      message: `Internal error: ${message}`,
      details,
      recovery: {
        suggestion: 'This is an unexpected error. Please report it if it persists.',
      },
    });
  },
};
