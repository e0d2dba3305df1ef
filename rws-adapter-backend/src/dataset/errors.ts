// src/dataset/errors.ts

export class RwsAdapterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required field of a controller-reported entity was absent or could not be
 * interpreted. The entity is not constructed.
 */
export class IncompleteResponseError extends RwsAdapterError {
  constructor(
    public readonly entity: string,
    public readonly field: string,
    detail?: string
  ) {
    super(
      detail
        ? `${entity}: field '${field}' ${detail}`
        : `${entity}: required field '${field}' is missing`
    );
  }
}

export class TypeMismatchError extends RwsAdapterError {
  constructor(
    public readonly signal: string,
    public readonly requested: string,
    public readonly actual: string
  ) {
    super(`Signal '${signal}' is ${actual}, cannot be read as ${requested}`);
  }
}

export class UnknownSignalError extends RwsAdapterError {
  constructor(public readonly signal: string) {
    super(`Signal '${signal}' is not part of this signal set`);
  }
}

export interface AggregatePartFailure {
  part: string;
  cause: unknown;
}

/**
 * One or more constituent queries of an aggregate snapshot failed, so no
 * aggregate was produced.
 */
export class PartialAggregateFailureError extends RwsAdapterError {
  constructor(
    public readonly aggregate: string,
    public readonly failures: readonly AggregatePartFailure[]
  ) {
    super(
      `${aggregate} could not be assembled; failed parts: ${failures
        .map((f) => `${f.part} (${describeCause(f.cause)})`)
        .join(", ")}`,
      { cause: failures[0]?.cause }
    );
  }
}

export class MalformedResponseError extends RwsAdapterError {
  constructor(public readonly resource: string) {
    super(`Response for ${resource} is not a parseable document`);
  }
}

export class ControllerRequestError extends RwsAdapterError {
  constructor(
    public readonly path: string,
    public readonly statusCode: number | undefined,
    cause?: unknown
  ) {
    super(
      statusCode === undefined
        ? `Request to ${path} failed: ${describeCause(cause)}`
        : `Request to ${path} failed with HTTP ${statusCode}`,
      { cause }
    );
  }
}

export class RefreshTimeoutError extends RwsAdapterError {
  constructor(public readonly timeoutMs: number) {
    super(`Refresh did not complete within ${timeoutMs} ms`);
  }
}

export class RefreshCancelledError extends RwsAdapterError {
  constructor() {
    super("Refresh was cancelled");
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
