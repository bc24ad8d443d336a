import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";

// Upstream ids longer than this, or with unexpected characters, are replaced
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Request ID middleware
 * Reuses an upstream request ID when present, otherwise generates one.
 * The ID is passed to the auth flows for log correlation and echoed back
 * in the response headers.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  // Check if request ID is already set (e.g., from load balancer)
  const existingRequestId =
    c.req.header("x-request-id") || c.req.header("x-correlation-id");

  const requestId =
    existingRequestId && REQUEST_ID_PATTERN.test(existingRequestId)
      ? existingRequestId
      : randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  await next();
}
