import type { ErrorRequestHandler, RequestHandler } from "express";
import { QueryFailedError } from "typeorm";
import type { Logger } from "./logger";
import type { ErrorResponse } from "./types";

export type ApiErrorKind = "NotFound" | "InvalidInput" | "UnprocessableEntity" | "Conflict" | "Internal";

const STATUS: Record<ApiErrorKind, number> = {
  NotFound: 404,
  InvalidInput: 400,
  UnprocessableEntity: 422,
  Conflict: 409,
  Internal: 500,
};

export class ApiError extends Error {
  readonly kind: ApiErrorKind;

  constructor(kind: ApiErrorKind, message: string) {
    super(message);
    this.name = "ApiError";
    this.kind = kind;
  }

  get status(): number {
    return STATUS[this.kind];
  }

  static notFound(message = "Glossary entry not found"): ApiError {
    return new ApiError("NotFound", message);
  }

  static invalidInput(message: string): ApiError {
    return new ApiError("InvalidInput", message);
  }

  static unprocessable(message: string): ApiError {
    return new ApiError("UnprocessableEntity", message);
  }

  static conflict(message: string): ApiError {
    return new ApiError("Conflict", message);
  }
}

export type ConstraintKind = "unique" | "foreign-key";

// postgres SQLSTATE codes, then better-sqlite3 extended result codes
const CONSTRAINT_CODES: Record<ConstraintKind, readonly string[]> = {
  unique: ["23505", "SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY"],
  "foreign-key": ["23503", "SQLITE_CONSTRAINT_FOREIGNKEY"],
};

function driverCode(err: QueryFailedError): string | undefined {
  const driverError: unknown = err.driverError;
  if (typeof driverError === "object" && driverError !== null && "code" in driverError) {
    const { code } = driverError;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function isConstraintViolation(err: unknown, kind?: ConstraintKind): boolean {
  if (!(err instanceof QueryFailedError)) return false;
  const code = driverCode(err);
  if (code === undefined) return false;
  const kinds: ConstraintKind[] = kind ? [kind] : ["unique", "foreign-key"];
  return kinds.some((k) => CONSTRAINT_CODES[k].includes(code));
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

/** Maps anything thrown by a handler onto the API taxonomy; unknown failures become Internal. */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) return err;
  if (isBodyParseError(err)) return ApiError.invalidInput("Malformed JSON body");
  if (isConstraintViolation(err)) return ApiError.conflict("Request conflicts with existing data");
  return new ApiError("Internal", "Internal server error");
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  const body: ErrorResponse = { error: "Not found" };
  res.status(404).json(body);
};

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    // body-parser and friends raise http-errors (413, 415, ...) that are safe to echo
    const passthrough =
      err instanceof Error && !(err instanceof ApiError) && !isBodyParseError(err) ? httpStatus(err) : undefined;
    if (passthrough !== undefined && err instanceof Error) {
      logger.warn({ err, path: req.path }, "request rejected");
      const body: ErrorResponse = { error: err.message };
      res.status(passthrough).json(body);
      return;
    }

    const apiError = toApiError(err);
    if (apiError.status >= 500) logger.error({ err, path: req.path }, "unhandled error");
    else logger.warn({ kind: apiError.kind, message: apiError.message, path: req.path }, "request failed");

    const body: ErrorResponse = { error: apiError.message };
    res.status(apiError.status).json(body);
  };
}
