/**
 * Transport mapping for operation errors
 */

import { TRPCError } from "@trpc/server";
import { OperationError, OperationResult } from "../errors";

type TRPCErrorCode = "BAD_REQUEST" | "NOT_FOUND" | "CONFLICT" | "INTERNAL_SERVER_ERROR";

export function trpcCodeFor(error: OperationError): TRPCErrorCode {
  switch (error.code) {
    case "VALIDATION_FAILED":
      return "BAD_REQUEST";
    case "NOT_FOUND":
      return "NOT_FOUND";
    case "CONFLICT":
      return "CONFLICT";
    case "PERSISTENCE_FAILED":
      return "INTERNAL_SERVER_ERROR";
  }
}

export function httpStatusFor(error: OperationError): number {
  switch (error.code) {
    case "VALIDATION_FAILED":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "CONFLICT":
      return 409;
    case "PERSISTENCE_FAILED":
      return 503;
  }
}

/**
 * Return the value of a successful result, or throw the matching TRPCError
 */
export function unwrapOrThrow<T>(result: OperationResult<T>): T {
  if (result.success) {
    return result.value;
  }
  throw new TRPCError({
    code: trpcCodeFor(result.error),
    message: result.error.message,
    cause: result.error,
  });
}
