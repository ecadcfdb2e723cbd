/**
 * Security Middleware
 *
 * Security headers for every response and a per-client rate limit for the
 * chat endpoint.
 */

import { Request, Response, NextFunction } from 'express';
import { RATE_LIMIT_CONSTANTS } from '../config/constants';
import { RateLimitError } from '../utils/errorHandler';

/**
 * Security headers middleware.
 * Adds essential security headers to all responses.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');

    // JSON API only; nothing to load
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}

export type RateLimitOptions = {
    windowMs: number;
    maxRequests: number;
    now?: () => number;
};

/**
 * Fixed-window rate limiter keyed by client IP.
 */
export function createRateLimit(options: RateLimitOptions) {
    const attempts = new Map<string, { count: number; resetTime: number }>();
    const clock = options.now ?? Date.now;

    return function rateLimit(req: Request, res: Response, next: NextFunction) {
        const clientId = req.ip || 'unknown';
        const now = clock();

        const clientData = attempts.get(clientId);

        if (!clientData || now > clientData.resetTime) {
            attempts.set(clientId, { count: 1, resetTime: now + options.windowMs });
            return next();
        }

        if (clientData.count >= options.maxRequests) {
            const retryAfter = Math.ceil((clientData.resetTime - now) / 1000);
            console.warn(`[Security] Rate limit exceeded for ${clientId}`);
            res.set('Retry-After', retryAfter.toString());
            return next(new RateLimitError(`Too many requests, retry in ${retryAfter}s`));
        }

        clientData.count++;
        next();
    };
}

export const chatRateLimit = createRateLimit({
    windowMs: RATE_LIMIT_CONSTANTS.CHAT_WINDOW_MS,
    maxRequests: RATE_LIMIT_CONSTANTS.CHAT_MAX_REQUESTS,
});
