export type AgentErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "PRECONDITION_FAILED"
  | "EXECUTION_FAILED"
  | "TRANSPORT_ERROR"
  | "IO_ERROR"
  | "INTERNAL_ERROR";

export class AgentError extends Error {
  constructor(
    public readonly code: AgentErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", 400, message, details);
  }
}

export class NotFoundError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", 404, message, details);
  }
}

export class ConflictError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFLICT", 409, message, details);
  }
}

export class PreconditionError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PRECONDITION_FAILED", 412, message, details);
  }
}

/** Recorded on an ExecutionRecord by the pipeline; never thrown past it. */
export class ExecutionFailure extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("EXECUTION_FAILED", 500, message, details);
  }
}

export class TransportError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TRANSPORT_ERROR", 400, message, details);
  }
}

export class IOError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("IO_ERROR", 503, message, details);
  }
}

export function toAgentError(error: unknown): AgentError {
  if (error instanceof AgentError) return error;
  const message = error instanceof Error ? error.message : "unknown error";
  return new AgentError("INTERNAL_ERROR", 500, message);
}
