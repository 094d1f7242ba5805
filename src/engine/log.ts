// ── Structured engine logging ───────────────────────────────────────────────
//
// One JSON object per line, same shape as the HTTP layer's logServerInfo /
// logServerError so both streams can be parsed by the same collector.
//
export type LogDetails = Record<string, unknown>;

function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) return { name: error.name, message: error.message };
  return { name: "UnknownError", message: String(error) };
}

export function logInfo(scope: string, details: LogDetails = {}): void {
  const serialized = {
    level: "info",
    scope,
    timestamp: new Date().toISOString(),
    ...details,
  };
  // eslint-disable-next-line no-console
  console.info(JSON.stringify(serialized));
}

export function logWarn(scope: string, details: LogDetails = {}): void {
  const serialized = {
    level: "warn",
    scope,
    timestamp: new Date().toISOString(),
    ...details,
  };
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify(serialized));
}

export function logError(scope: string, error: unknown, details: LogDetails = {}): void {
  const serialized = {
    level: "error",
    scope,
    ...describeError(error),
    timestamp: new Date().toISOString(),
    ...details,
  };
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(serialized));
}
