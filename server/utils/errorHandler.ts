import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { createLogger } from "./logger";

const logger = createLogger("ErrorHandler");

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  isOperational = true;
  constructor(message = "Rate limit exceeded") {
    super(message);
    this.name = "RateLimitError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

/**
 * The document store could not be reached or failed mid-query.
 * The underlying driver error is kept as `cause` for logging only.
 */
export class StoreUnavailableError extends Error implements AppError {
  statusCode = 503;
  code = "store_unavailable";
  isOperational = true;
  constructor(operation: string, cause?: unknown) {
    super(`Document store unavailable during ${operation}`, { cause });
    this.name = "StoreUnavailableError";
  }
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);

  if (statusCode >= 500 && context) {
    logError(context, error);
  }

  // Server-side failures never expose driver or upstream messages
  const message = statusCode >= 500 ? classifyPipelineError(error).userMessage : getErrorMessage(error);
  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  logger.error(`[${context}] ${getErrorMessage(error)}`, error);
}

export interface ClassifiedError {
  type: "store_unavailable" | "upstream_unavailable" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

export const TEMPORARILY_UNAVAILABLE_MESSAGE =
  "The regulations database is temporarily unavailable. Please try again in a few minutes.";

export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const appError: AppError | undefined = err instanceof Error ? err : undefined;
  const errorCode = appError?.code ?? appError?.statusCode;
  const stack = err instanceof Error ? err.stack : undefined;

  if (err instanceof StoreUnavailableError) {
    return {
      type: "store_unavailable",
      userMessage: TEMPORARILY_UNAVAILABLE_MESSAGE,
      errorMessage, errorCode, stack,
    };
  }

  if (err instanceof ExternalServiceError) {
    return {
      type: "upstream_unavailable",
      userMessage: `The ${err.service} service is temporarily unavailable. Please try again later.`,
      errorMessage, errorCode, stack,
    };
  }

  return {
    type: "internal",
    userMessage: "Sorry, something went wrong while processing that request.",
    errorMessage, errorCode, stack,
  };
}
