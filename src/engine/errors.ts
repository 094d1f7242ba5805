// ── Error taxonomy ──────────────────────────────────────────────────────────
//
// Every failure the core surfaces to a caller is a GovernanceError subclass.
// The HTTP layer maps `httpStatus` straight onto the response; nothing here
// knows about express.
//
import type { z } from "zod";

// ── Types ───────────────────────────────────────────────────────────────────

/** One schema violation, flattened from a zod issue. */
export type Violation = {
  path: string;
  message: string;
};

export type NotFoundResource = "community" | "plugin" | "process" | "account" | "metagov-id";

// ── Base ────────────────────────────────────────────────────────────────────

export class GovernanceError extends Error {
  readonly code: string;
  readonly httpStatus: number;
  readonly details?: Record<string, unknown>;

  constructor(code: string, httpStatus: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
    this.details = details;
  }
}

// ── Lookup ──────────────────────────────────────────────────────────────────

export class NotFoundError extends GovernanceError {
  readonly resource: NotFoundResource;

  constructor(resource: NotFoundResource, message: string) {
    super(resource === "plugin" ? "PluginNotFound" : "NotFound", 404, message, { resource });
    this.resource = resource;
  }
}

export class UnknownActionError extends GovernanceError {
  constructor(pluginName: string, actionId: string, available: string[]) {
    super(
      "UnknownAction",
      404,
      `No such action '${actionId}' for ${pluginName} plugin. Available actions: ${available.join(", ") || "none"}`,
      { pluginName, actionId, available },
    );
  }
}

export class NotSupportedError extends GovernanceError {
  constructor(message: string) {
    super("NotSupported", 400, message);
  }
}

// ── Schema ──────────────────────────────────────────────────────────────────

export function toViolations(issues: z.ZodIssue[]): Violation[] {
  return issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

function formatViolations(violations: Violation[]): string {
  return violations.map((v) => `${v.path}: ${v.message}`).join("; ");
}

export class InvalidParametersError extends GovernanceError {
  readonly violations: Violation[];

  constructor(scope: string, violations: Violation[]) {
    super("InvalidParameters", 400, `Invalid ${scope}: ${formatViolations(violations)}`, { violations });
    this.violations = violations;
  }
}

/** The handler returned something its own output schema rejects. */
export class InvalidResultError extends GovernanceError {
  readonly violations: Violation[];

  constructor(scope: string, violations: Violation[]) {
    super("InvalidResult", 500, `Invalid result from ${scope}: ${formatViolations(violations)}`, { violations });
    this.violations = violations;
  }
}

// ── Structural ──────────────────────────────────────────────────────────────

export class DuplicateLinkError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DuplicateLink", 409, message, details);
  }
}

export class IntegrityViolationError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("IntegrityViolation", 409, message, details);
  }
}

/** Data corruption: a link-group with no primary member. */
export class NoPrimaryFoundError extends GovernanceError {
  constructor(externalId: number) {
    super("NoPrimaryFound", 500, `No primary ID associated with ${externalId}`, { externalId });
  }
}

// ── Plugin runtime ──────────────────────────────────────────────────────────

export class PluginInternalError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>, code = "PluginInternalError", httpStatus = 502) {
    super(code, httpStatus, message, details);
  }

  /** Wrap anything a plugin hook threw, keeping GovernanceErrors intact. */
  static from(error: unknown, scope: string): GovernanceError {
    if (error instanceof GovernanceError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new PluginInternalError(`${scope}: ${message}`);
  }
}

export class HookTimeoutError extends PluginInternalError {
  constructor(scope: string, timeoutMs: number) {
    super(`${scope} timed out after ${timeoutMs}ms`, { timeoutMs }, "HookTimeout", 504);
  }
}

/** A hook kept running after the engine stopped waiting on it and then tried to write. */
export class HookExpiredError extends PluginInternalError {
  constructor(scope: string) {
    super(`${scope} wrote after its hook window closed`, { scope }, "HookExpired", 500);
  }
}

// ── Registry ────────────────────────────────────────────────────────────────

export class DuplicateRegistrationError extends GovernanceError {
  constructor(pluginName: string) {
    super("DuplicateRegistration", 500, `Plugin '${pluginName}' is already registered`, { pluginName });
  }
}

export class RegistryFrozenError extends GovernanceError {
  constructor(pluginName: string) {
    super("RegistryFrozen", 500, `Cannot register '${pluginName}': the plugin registry is frozen`, { pluginName });
  }
}
