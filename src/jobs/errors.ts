// Job failure taxonomy. Failures travel as values; nothing here is meant to crash the host.
export type JobErrorCode =
  | "ToolUnavailable"
  | "InvalidParameters"
  | "SpawnFailed"
  | "ProcessFailed"
  | "VerificationFailed"
  // Non-fatal. A stderr read error only ends the pump and is logged; no job fails with it.
  | "StreamReadError";

export class JobError extends Error {
  readonly code: JobErrorCode;
  // Raw ffmpeg output, attached verbatim for ProcessFailed.
  readonly diagnostics?: string;

  constructor(
    code: JobErrorCode,
    message: string,
    options: { diagnostics?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "JobError";
    this.code = code;
    this.diagnostics = options.diagnostics;
  }
}

// Thrown when a job is requested while another one is still in flight.
export class JobBusyError extends Error {
  constructor(activeToken: string) {
    super(`Job ${activeToken} is still running; wait for it to finish or stop it first.`);
    this.name = "JobBusyError";
  }
}

export const isJobError = (value: unknown): value is JobError =>
  value instanceof JobError;

export const formatError = (error: unknown) => {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "Unknown error";
};

export const formatErrorWithLogs = (message: string, logTail: string[]) => {
  if (logTail.length === 0) {
    return message;
  }
  const tail = logTail.join("\n").trim();
  return tail
    ? `${message}\n\n--- ffmpeg log tail ---\n${tail}`
    : message;
};
