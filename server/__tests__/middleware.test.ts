import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Request, Response, NextFunction } from "express";
import { chatRequestSchema } from "@shared/schema";
import { addSecurityHeaders, createRateLimit } from "../middleware/security";
import { querySchemas, validate } from "../middleware/validation";
import { RateLimitError, ValidationError } from "../utils/errorHandler";

describe("validate", () => {
  let mockNext: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockNext = vi.fn();
  });

  it("replaces the body with the parsed value", () => {
    const req: Partial<Request> = { body: { message: "find EPA", format: "plaintext" } };
    validate({ body: chatRequestSchema })(req as Request, {} as Response, mockNext as NextFunction);

    expect(mockNext).toHaveBeenCalledWith();
    expect(req.body).toEqual({ message: "find EPA", format: "plaintext" });
  });

  it("rejects a body without a message", () => {
    const req: Partial<Request> = { body: { chatId: "abc" } };
    validate({ body: chatRequestSchema })(req as Request, {} as Response, mockNext as NextFunction);

    const [error] = mockNext.mock.calls[0];
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe("message: Required");
  });

  it("rejects an unknown output format", () => {
    const req: Partial<Request> = { body: { message: "help", format: "html" } };
    validate({ body: chatRequestSchema })(req as Request, {} as Response, mockNext as NextFunction);

    expect(mockNext.mock.calls[0][0]).toBeInstanceOf(ValidationError);
  });

  it("applies query defaults", () => {
    const req: Partial<Request> = { query: {} };
    validate({ query: querySchemas.debugSearch })(req as Request, {} as Response, mockNext as NextFunction);

    expect(mockNext).toHaveBeenCalledWith();
    expect(req.query).toEqual({ query: "regulation", limit: 5 });
  });
});

describe("security middleware", () => {
  it("sets security headers", () => {
    const setHeader = vi.fn();
    const next = vi.fn();
    addSecurityHeaders({} as Request, { setHeader } as Partial<Response> as Response, next);

    expect(setHeader).toHaveBeenCalledWith("X-Frame-Options", "DENY");
    expect(setHeader).toHaveBeenCalledWith("X-Content-Type-Options", "nosniff");
    expect(next).toHaveBeenCalled();
  });

  it("limits requests per client within the window", () => {
    let now = 0;
    const limit = createRateLimit({ windowMs: 60_000, maxRequests: 2, now: () => now });
    const req = { ip: "10.0.0.1" } as Partial<Request> as Request;
    const res = { set: vi.fn() };
    const next = vi.fn();
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    limit(req, res as Partial<Response> as Response, next);
    limit(req, res as Partial<Response> as Response, next);
    now = 30_000;
    limit(req, res as Partial<Response> as Response, next);

    expect(next).toHaveBeenNthCalledWith(1);
    expect(next).toHaveBeenNthCalledWith(2);
    expect(next.mock.calls[2][0]).toBeInstanceOf(RateLimitError);
    expect(res.set).toHaveBeenCalledWith("Retry-After", "30");

    now = 60_001;
    limit(req, res as Partial<Response> as Response, next);
    expect(next).toHaveBeenNthCalledWith(4);
    warn.mockRestore();
  });
});
