import { describe, it, expect, vi, afterEach } from "vitest";
import { EventForwarder, type DriverEvent } from "../src/engine/eventForwarder.js";
import { createFetchRecorder } from "./helpers.js";

const baseEvent = {
  community: "riverside",
  source: "poll",
  eventType: "vote_cast",
  data: { choice: "yes" },
  initiator: { userId: "u-1", provider: "poll" },
};

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("EventForwarder", () => {
  it("POSTs events to the receiver with a seconds-since-epoch timestamp", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T12:00:00.500Z"));
    const { fetchImpl, requests } = createFetchRecorder(202);
    const forwarder = new EventForwarder({ receiverUrl: "https://driver.example.test/events", timeoutMs: 1_000, fetchImpl });

    const result = await forwarder.emit(baseEvent);

    expect(result).toEqual({ delivered: true, status: 202 });
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].headers["content-type"]).toBe("application/json");
    expect(requests[0].headers["x-correlation-id"]).toMatch(/^[0-9a-f-]{36}$/);
    expect(requests[0].body).toEqual({ ...baseEvent, timestamp: "1772366400.5" });
  });

  it("hands events to in-process listeners until they unsubscribe", async () => {
    const forwarder = new EventForwarder({ timeoutMs: 1_000 });
    const seen: DriverEvent[] = [];
    const unsubscribe = forwarder.onEvent((event) => seen.push(event));

    await forwarder.emit(baseEvent);
    unsubscribe();
    await forwarder.emit(baseEvent);

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject(baseEvent);
  });

  it("does not deliver anywhere when no receiver is configured", async () => {
    const { fetchImpl, requests } = createFetchRecorder();
    const forwarder = new EventForwarder({ timeoutMs: 1_000, fetchImpl });
    await expect(forwarder.emit(baseEvent)).resolves.toEqual({ delivered: false });
    expect(requests).toHaveLength(0);
  });

  it("keeps going when a listener throws", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const forwarder = new EventForwarder({ timeoutMs: 1_000 });
    const seen: string[] = [];
    forwarder.onEvent(() => {
      throw new Error("listener broke");
    });
    forwarder.onEvent((event) => seen.push(event.eventType));
    await forwarder.emit(baseEvent);
    expect(seen).toEqual(["vote_cast"]);
  });

  it("reports a non-2xx receiver without throwing", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { fetchImpl } = createFetchRecorder(503);
    const forwarder = new EventForwarder({ receiverUrl: "https://driver.example.test/events", timeoutMs: 1_000, fetchImpl });
    await expect(forwarder.emit(baseEvent)).resolves.toEqual({
      delivered: false,
      status: 503,
      error: "Receiver returned 503",
    });
  });

  it("reports transport failures without throwing", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const forwarder = new EventForwarder({ receiverUrl: "https://driver.example.test/events", timeoutMs: 1_000, fetchImpl });
    await expect(forwarder.postJson("https://driver.example.test/events", {}, "test.post")).resolves.toEqual({
      delivered: false,
      error: "fetch failed",
    });
  });
});
