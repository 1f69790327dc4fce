import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { SplitterError, type SplitterErrorKind } from "../errors.js";

const STATUS_BY_KIND: Record<SplitterErrorKind, number> = {
  InvalidTargetFormat: 400,
  InvalidNumberFormat: 400,
  InvalidSemantic: 400,
  InvalidName: 400,
  MemberNotFound: 404,
  GroupNotFound: 404,
  LogEntryNotFound: 404,
};

export interface ErrorBody {
  error: string;
  message: string;
}

// Errors raised by express.json() before a handler runs
interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500 &&
    "type" in error &&
    typeof error.type === "string"
  );
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof SplitterError) {
    return {
      status: STATUS_BY_KIND[error.kind],
      body: { error: error.kind, message: error.message },
    };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: "ValidationError",
        message: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
      },
    };
  }

  if (isBodyParserError(error)) {
    return {
      status: error.status,
      body: {
        error: "ValidationError",
        message:
          error.type === "entity.parse.failed" ? "body: Malformed JSON" : `body: ${error.message}`,
      },
    };
  }

  return {
    status: 500,
    body: { error: "InternalError", message: "Something went wrong" },
  };
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorResponse(error);

  if (status === 500) {
    console.error(`Unhandled error on ${req.method} ${req.path}:`, error);
  }

  res.status(status).json(body);
}
