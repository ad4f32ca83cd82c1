export interface AssistantsErrorOptions {
  message: string;
  /** HTTP status of the response that produced the error, when there was one. */
  statusCode?: number;
  code?: string;
  param?: string | null;
  type?: string;
  headers?: Record<string, string>;
  requestId?: string;
  cause?: Error;
}

/**
 * Root of every error this library throws. Service failures carry the
 * fields of the API error body; local failures (configuration, run
 * outcomes, tool handlers) leave them unset.
 */
export abstract class AssistantsError extends Error {
  public readonly statusCode?: number;
  public readonly code?: string;
  public readonly param?: string | null;
  public readonly type?: string;
  public readonly headers?: Record<string, string>;
  public readonly requestId?: string;
  public override readonly cause?: Error;

  constructor({ message, cause, ...details }: AssistantsErrorOptions) {
    super(message);
    this.name = new.target.name;
    this.statusCode = details.statusCode;
    this.code = details.code;
    this.param = details.param;
    this.type = details.type;
    this.headers = details.headers;
    this.requestId = details.requestId;
    this.cause = cause;

    Error.captureStackTrace(this, new.target);
  }

  /** Whether sending the same request again may succeed. */
  get retryable(): boolean {
    return false;
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      param: this.param,
      type: this.type,
      requestId: this.requestId,
      retryable: this.retryable,
    };
    if (this.cause) json['cause'] = { name: this.cause.name, message: this.cause.message };
    return json;
  }
}
