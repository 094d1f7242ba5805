import { HookExpiredError, HookTimeoutError } from "./errors.js";
import { logError } from "./log.js";

/**
 * Race `work` against a timer. A timeout rejects with HookTimeoutError; if the
 * abandoned work later fails, that failure is logged rather than left unhandled.
 */
export async function withTimeout<T>(work: Promise<T> | T, timeoutMs: number, scope: string): Promise<T> {
  const pending = Promise.resolve(work);
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return pending;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      pending.catch((lateError: unknown) => logError(`${scope}.late`, lateError));
      reject(new HookTimeoutError(scope, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Write permission for one hook invocation. The caller revokes it as soon as
 * it stops waiting on the hook; anything the hook writes after that throws
 * HookExpiredError instead of landing.
 */
export class HookLease {
  private revoked = false;

  constructor(readonly scope: string) {}

  get active(): boolean {
    return !this.revoked;
  }

  revoke(): void {
    this.revoked = true;
  }

  assertActive(): void {
    if (this.revoked) throw new HookExpiredError(this.scope);
  }
}
