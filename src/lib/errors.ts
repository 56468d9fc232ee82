export type AcquisitionErrorKind =
  | "ProcessSpawnFailure"
  | "ProcessExitFailure"
  | "ParseFailure"
  | "UserCancelled";

/**
 * Base class for failures that abort an acquisition step.
 * Strategies catch these and return the partial report.
 */
export class AcquisitionError extends Error {
  constructor(readonly kind: AcquisitionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
  }
}

export class ProcessSpawnFailure extends AcquisitionError {
  constructor(readonly cmd: string[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("ProcessSpawnFailure", `Unable to start ${cmd.join(" ")}: ${reason}`, { cause });
  }
}

export class ProcessExitFailure extends AcquisitionError {
  constructor(readonly cmd: string[], readonly code: number) {
    super("ProcessExitFailure", `Command failed (${code}): ${cmd.join(" ")}`);
  }
}

export class ParseFailure extends AcquisitionError {
  constructor(message: string, readonly text: string) {
    super("ParseFailure", message);
  }
}

export class UserCancelled extends AcquisitionError {
  constructor(what: string) {
    super("UserCancelled", `No ${what} was selected`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
