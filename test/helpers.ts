// Shared fixtures: a governance core on a throwaway SQLite file and a fetch
// stand-in that records every outbound request.
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createGovernanceCore, type GovernanceCore, type GovernanceCoreOptions } from "../src/engine/core.js";

export type TestCore = {
  core: GovernanceCore;
  tmpDir: string;
  cleanup(): void;
};

export function createTestCore(options: Partial<GovernanceCoreOptions> = {}): TestCore {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "govbridge-test-"));
  const core = createGovernanceCore({
    dbPath: path.join(tmpDir, "govbridge.db"),
    plugins: [],
    hookTimeoutMs: 1_000,
    outboundTimeoutMs: 1_000,
    ...options,
  });
  return {
    core,
    tmpDir,
    cleanup() {
      core.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
};

/** A fetch stand-in answering every request with `status`. */
export function createFetchRecorder(status = 200): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (...args: Parameters<typeof fetch>) => {
    const [input, init] = args;
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null,
    });
    return new Response(null, { status });
  };
  return { fetchImpl, requests };
}
