export type SubmitErrorCode =
  | "InvalidArgument"
  | "InvalidConfig"
  | "FileWriteFailure"
  | "SubmissionProcessFailure";

export class SubmitError extends Error {
  readonly code: SubmitErrorCode;

  constructor(code: SubmitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SubmitError";
    this.code = code;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
