/**
 * Response Builder
 *
 * Consistent tool responses: a one-line summary first, then the payload,
 * then hints (warnings and follow-up tools) and request metadata.
 */

export interface MCPResponseMeta {
  requestId: string;
  durationMs: number;
}

export interface TruncationInfo {
  returned: number;
  total: number;
}

export interface ResponseHints {
  nextActions?: string[];
  relatedTools?: string[];
  warnings?: string[];
}

export interface MCPResponse<T> {
  summary: string;
  data: T;
  truncation?: TruncationInfo;
  hints?: ResponseHints;
  meta: MCPResponseMeta;
}

/**
 * Text-only CallTool result; open to the extra keys the SDK result allows
 */
export interface ToolContent {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export class ResponseBuilder<T> {
  private summary = '';
  private data: T | null = null;
  private truncation?: TruncationInfo;
  private hints: ResponseHints = {};
  private readonly startTime: number;

  constructor(private readonly requestId: string, private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  /**
   * Set the summary (1-2 sentences describing the response)
   */
  withSummary(summary: string): this {
    this.summary = summary;
    return this;
  }

  withData(data: T): this {
    this.data = data;
    return this;
  }

  /**
   * Record that `returned` of `total` items made it into the payload
   */
  withTruncation(returned: number, total: number): this {
    if (returned < total) {
      this.truncation = { returned, total };
      this.addWarning(`Showing ${returned} of ${total}; narrow the filters or raise the limit to see more.`);
    }
    return this;
  }

  addNextAction(action: string): this {
    (this.hints.nextActions ??= []).push(action);
    return this;
  }

  addWarning(warning: string): this {
    (this.hints.warnings ??= []).push(warning);
    return this;
  }

  withRelatedTools(tools: string[]): this {
    this.hints.relatedTools = tools;
    return this;
  }

  build(): MCPResponse<T> {
    if (this.data === null) {
      throw new Error('Response data is required');
    }
    if (!this.summary) {
      throw new Error('Response summary is required');
    }

    const response: MCPResponse<T> = {
      summary: this.summary,
      data: this.data,
      meta: {
        requestId: this.requestId,
        durationMs: this.now() - this.startTime,
      },
    };
    if (this.truncation) {
      response.truncation = this.truncation;
    }
    if (Object.keys(this.hints).length > 0) {
      response.hints = this.hints;
    }
    return response;
  }

  /**
   * Build and serialize to MCP content format
   */
  buildContent(): ToolContent {
    return {
      content: [{ type: 'text', text: JSON.stringify(this.build(), null, 2) }],
    };
  }
}

export function createResponseBuilder<T>(requestId?: string): ResponseBuilder<T> {
  const id = requestId ?? `req_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
  return new ResponseBuilder<T>(id);
}
