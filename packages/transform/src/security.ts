// packages/transform/src/security.ts

import type { RequestHandler } from "express";

export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  "X-Frame-Options": "DENY",
  "X-Content-Type-Options": "nosniff",
  "X-XSS-Protection": "1; mode=block",
  "Strict-Transport-Security": "max-age=31536000; includeSubDomains",
  "Referrer-Policy": "strict-origin-when-cross-origin",
  "Content-Security-Policy": "default-src 'self'",
  "Permissions-Policy": "geolocation=(), microphone=(), camera=()",
};

/**
 * Sets the security headers on every response, including errors.
 */
export function securityHeaders(
  extra: Record<string, string> = {}
): RequestHandler {
  const headers = { ...SECURITY_HEADERS, ...extra };
  return (_req, res, next) => {
    res.set(headers);
    next();
  };
}
