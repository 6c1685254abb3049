export type PipelineErrorKind = "MalformedPayload" | "InvalidRecord";

export class PipelineError extends Error {
  constructor(public readonly kind: PipelineErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** The upload could not be decoded, or its text is not a JSON array of records. */
export class MalformedPayloadError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super("MalformedPayload", message, options);
    this.name = "MalformedPayloadError";
  }
}

/** A record breaks an assumption one of the views depends on. */
export class InvalidRecordError extends PipelineError {
  constructor(
    public readonly recordIndex: number,
    public readonly field: string,
    message: string
  ) {
    super("InvalidRecord", message);
    this.name = "InvalidRecordError";
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
