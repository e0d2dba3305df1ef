import { Response } from "express";
import logger from "../../utility/logger";
import {
  ControllerRequestError,
  IncompleteResponseError,
  MalformedResponseError,
  PartialAggregateFailureError,
  RefreshTimeoutError,
  TypeMismatchError,
  UnknownSignalError,
} from "../../dataset/errors";

export function statusCodeFor(error: unknown): number {
  if (
    error instanceof PartialAggregateFailureError ||
    error instanceof IncompleteResponseError ||
    error instanceof MalformedResponseError ||
    error instanceof ControllerRequestError
  ) {
    return 502;
  }
  if (error instanceof RefreshTimeoutError) return 504;
  if (error instanceof TypeMismatchError) return 409;
  if (error instanceof UnknownSignalError) return 404;
  return 500;
}

export function sendFailure(res: Response, operation: string, error: unknown) {
  const statusCode = statusCodeFor(error);
  logger.error(`Failure on ${operation} Request: ${error}`);
  if (statusCode === 500) {
    res.status(500).send("Internal Server Error");
    return;
  }
  res.status(statusCode).json({
    error: error instanceof Error ? error.name : "Error",
    message: error instanceof Error ? error.message : String(error),
  });
}
