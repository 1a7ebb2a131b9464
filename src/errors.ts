/**
 * Error taxonomy for investigations
 *
 * Every error here is local to one investigation; none of them cross into
 * another run.
 */

/**
 * Standard error codes
 */
export enum InvestigationErrorCode {
  INVALID_INPUT = "INVALID_INPUT",
  MALFORMED_TERMINAL_OUTPUT = "MALFORMED_TERMINAL_OUTPUT",
  TOOL_DISPATCH_ERROR = "TOOL_DISPATCH_ERROR",
  COMPLETION_CAPABILITY_ERROR = "COMPLETION_CAPABILITY_ERROR",
  NOT_FOUND = "NOT_FOUND",
}

/**
 * Base class for all investigation errors
 */
export class InvestigationError extends Error {
  readonly code: InvestigationErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: InvestigationErrorCode,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "InvestigationError";
    this.code = code;
    this.details = options?.details;
  }

  toJSON(): { code: InvestigationErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/**
 * Bad issue data, rejected before the loop starts
 */
export class InvalidInputError extends InvestigationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(InvestigationErrorCode.INVALID_INPUT, message, { details });
    this.name = "InvalidInputError";
  }
}

/**
 * The terminal payload failed schema validation
 */
export class MalformedTerminalOutputError extends InvestigationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      InvestigationErrorCode.MALFORMED_TERMINAL_OUTPUT,
      `Malformed terminal output: ${issues.join("; ")}`,
      { details: { issues } },
    );
    this.name = "MalformedTerminalOutputError";
    this.issues = issues;
  }
}

/**
 * A non-recoverable tool failed
 */
export class ToolDispatchError extends InvestigationError {
  readonly tool: string;

  constructor(tool: string, message: string, cause?: unknown) {
    super(InvestigationErrorCode.TOOL_DISPATCH_ERROR, `Tool ${tool} failed: ${message}`, {
      details: { tool },
      cause,
    });
    this.name = "ToolDispatchError";
    this.tool = tool;
  }
}

/**
 * Transport or model failure from the completion capability, including timeouts
 */
export class CompletionCapabilityError extends InvestigationError {
  constructor(message: string, cause?: unknown) {
    super(InvestigationErrorCode.COMPLETION_CAPABILITY_ERROR, message, { cause });
    this.name = "CompletionCapabilityError";
  }
}

export class NotFoundError extends InvestigationError {
  constructor(kind: string, id: string) {
    super(InvestigationErrorCode.NOT_FOUND, `${kind} not found: ${id}`, { details: { kind, id } });
    this.name = "NotFoundError";
  }
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
