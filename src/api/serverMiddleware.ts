// ── Express middleware: correlation ID, logging, error responses ───────────
import crypto from "node:crypto";
import express from "express";
import type { z } from "zod";
import { GovernanceError, InvalidParametersError, toViolations } from "../engine/errors.js";

export const CORRELATION_ID_HEADER = "x-correlation-id";
export const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{8,128}$/;

// ── Correlation ID middleware ────────────────────────────────────────────────

function normalizeCorrelationId(value: string | null | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!CORRELATION_ID_PATTERN.test(trimmed)) return null;
  return trimmed;
}

export function withCorrelationId(req: express.Request, res: express.Response, next: express.NextFunction): void {
  const incoming = normalizeCorrelationId(req.get(CORRELATION_ID_HEADER));
  const correlationId = incoming ?? crypto.randomUUID();
  res.locals.correlationId = correlationId;
  res.setHeader("X-Correlation-Id", correlationId);
  next();
}

export function getCorrelationId(res: express.Response): string {
  const fromLocals: unknown = res.locals?.correlationId;
  return (typeof fromLocals === "string" && fromLocals) || crypto.randomUUID();
}

// ── Logging ─────────────────────────────────────────────────────────────────

export function logServerError(scope: string, correlationId: string, error: unknown): void {
  const serialized = {
    level: "error",
    scope,
    correlationId,
    name: error instanceof Error ? error.name : "UnknownError",
    message: error instanceof Error ? error.message : "Unhandled server error",
    timestamp: new Date().toISOString(),
  };
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(serialized));
}

export function logServerInfo(scope: string, correlationId: string, details: Record<string, unknown>): void {
  const serialized = {
    level: "info",
    scope,
    correlationId,
    timestamp: new Date().toISOString(),
    ...details,
  };
  // eslint-disable-next-line no-console
  console.info(JSON.stringify(serialized));
}

// ── Responses ───────────────────────────────────────────────────────────────

export function sendData(res: express.Response, data: unknown, status = 200): void {
  res.status(status).json({ success: true, correlationId: getCorrelationId(res), data });
}

/**
 * Map an error onto the response envelope. GovernanceErrors carry their own
 * status and code; anything else is a logged 500.
 */
export function sendError(req: express.Request, res: express.Response, error: unknown): void {
  const correlationId = getCorrelationId(res);
  if (error instanceof GovernanceError) {
    if (error.httpStatus >= 500) logServerError(`${req.method} ${req.path}`, correlationId, error);
    res.status(error.httpStatus).json({
      success: false,
      correlationId,
      error: error.message,
      code: error.code,
      ...(error.details ? { details: error.details } : {}),
    });
    return;
  }
  logServerError(`${req.method} ${req.path}`, correlationId, error);
  res.status(500).json({ success: false, correlationId, error: "Internal server error" });
}

type RouteHandler = (req: express.Request, res: express.Response) => Promise<void> | void;

/** Run a handler and route anything it throws or rejects with through sendError. */
export function handle(handler: RouteHandler): express.RequestHandler {
  return (req, res) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => sendError(req, res, error));
  };
}

/** Parse a numeric path or query parameter; null when it is not a positive integer. */
export function parseId(value: unknown): number | null {
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
}

/** Validate a request body or query against a zod schema; InvalidParameters on mismatch. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown, scope = "request body"): z.infer<T> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) throw new InvalidParametersError(scope, toViolations(parsed.error.issues));
  return parsed.data;
}
