// ── Driver event forwarding ─────────────────────────────────────────────────
//
// Domain events raised by plugins are handed to in-process listeners and,
// when a receiver URL is configured, POSTed to the driver as JSON. Delivery
// is best-effort: a failed POST is logged and dropped. The driver recovers
// by re-polling or by the platform re-delivering its webhook.
//
import crypto from "node:crypto";
import { logError, logInfo } from "./log.js";
import type { EventInitiator } from "./pluginRegistry.js";
import type { JsonObject } from "./stateStore.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type DriverEvent = {
  community: string;
  source: string;
  eventType: string;
  /** Seconds since the epoch, as a decimal string. */
  timestamp: string;
  data: JsonObject;
  initiator: EventInitiator;
};

export type DriverEventListener = (event: DriverEvent) => void;

export type EventForwarderOptions = {
  receiverUrl?: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

export type DeliveryResult = { delivered: boolean; status?: number; error?: string };

// ── Forwarder ───────────────────────────────────────────────────────────────

export class EventForwarder {
  private readonly listeners = new Set<DriverEventListener>();
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: EventForwarderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** Subscribe to every event; returns the unsubscribe function. */
  onEvent(listener: DriverEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async emit(input: Omit<DriverEvent, "timestamp">): Promise<DeliveryResult> {
    const event: DriverEvent = { ...input, timestamp: String(Date.now() / 1000) };

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logError("events.listener", error, { eventType: event.eventType, source: event.source });
      }
    }

    if (!this.options.receiverUrl) {
      logInfo("events.emitted", { eventType: event.eventType, source: event.source, community: event.community });
      return { delivered: false };
    }
    return this.postJson(this.options.receiverUrl, event, "events.forward");
  }

  /**
   * POST a JSON body with a bounded timeout. Never throws: transport errors
   * and non-2xx responses come back as `{ delivered: false }` and are logged.
   */
  async postJson(url: string, body: unknown, scope: string): Promise<DeliveryResult> {
    const correlationId = crypto.randomUUID();
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json", "x-correlation-id": correlationId },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (!response.ok) {
        logError(scope, new Error(`Receiver returned ${response.status}`), { url, correlationId });
        return { delivered: false, status: response.status, error: `Receiver returned ${response.status}` };
      }
      return { delivered: true, status: response.status };
    } catch (error) {
      logError(scope, error, { url, correlationId });
      return { delivered: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}
