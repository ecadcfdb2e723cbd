/**
 * Validation Middleware
 *
 * Provides Zod-based request validation for body and query.
 * Integrates with existing error handling via ValidationError.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodSchema, ZodError } from "zod";
import { SEARCH_LIMITS } from "../config/constants";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 *
 * @example
 * app.post("/api/chat",
 *   validate({ body: chatRequestSchema }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

// Query parameter schemas for debug endpoints
export const querySchemas = {
  debugSearch: z.object({
    query: z.string().trim().min(1).default("regulation"),
    agency: z.string().trim().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(SEARCH_LIMITS.MAX_RESULTS).default(5),
  }),
};
