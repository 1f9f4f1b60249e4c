import { describe, it, expect } from "vitest";
import {
  RetrievalError,
  StaticConfigSource,
  type ConfigSource,
} from "../../src/audit/config-source.js";
import { AuditRunner, type AuditRunnerOptions } from "../../src/audit/runner.js";
import { ComplianceEngine } from "../../src/compliance/engine.js";
import { COMPLIANT_CONFIG, makeTemplate, silentLogger } from "../helpers/fixtures.js";

const FAST_RETRY = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 };

function makeRunner(source: ConfigSource, options: AuditRunnerOptions = {}): AuditRunner {
  return new AuditRunner(new ComplianceEngine(makeTemplate()), source, silentLogger(), {
    retry: FAST_RETRY,
    ...options,
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("AuditRunner", () => {
  it("audits every device and aggregates the results", async () => {
    const source = new StaticConfigSource({ R1: COMPLIANT_CONFIG, R2: "transport input telnet" });
    const report = await makeRunner(source).run(["R1", "R2"]);

    expect(report.devices.map((d) => [d.deviceId, d.status])).toEqual([
      ["R1", "PASS"],
      ["R2", "FAIL"],
    ]);
    expect(report.totals.violations).toBe(3);
    expect(report.unreachable).toEqual([]);
  });

  it("keeps submission order when devices finish out of order", async () => {
    const source: ConfigSource = {
      async fetch(deviceId) {
        await delay(deviceId === "slow" ? 30 : 0);
        return COMPLIANT_CONFIG;
      },
    };
    const report = await makeRunner(source).run(["slow", "fast"]);
    expect(report.devices.map((d) => d.deviceId)).toEqual(["slow", "fast"]);
  });

  it("marks a device unreachable without aborting the others", async () => {
    const source = new StaticConfigSource({ R1: COMPLIANT_CONFIG, R3: "" });
    const report = await makeRunner(source).run(["R1", "R2", "R3"]);

    expect(report.devices.map((d) => d.deviceId)).toEqual(["R1", "R3"]);
    expect(report.unreachable).toEqual([
      { deviceId: "R2", reason: "Configuration not found for R2" },
    ]);
    expect(report.totals.unreachable).toBe(1);
    expect(report.totals.devices).toBe(3);
  });

  it("retries retriable retrieval failures", async () => {
    let calls = 0;
    const source: ConfigSource = {
      async fetch(deviceId) {
        calls++;
        if (calls < 3) throw new RetrievalError(deviceId, "connection reset", true);
        return COMPLIANT_CONFIG;
      },
    };
    const report = await makeRunner(source).run(["R1"]);
    expect(calls).toBe(3);
    expect(report.devices[0].status).toBe("PASS");
  });

  it("does not retry permanent failures", async () => {
    let calls = 0;
    const source: ConfigSource = {
      async fetch(deviceId) {
        calls++;
        throw new RetrievalError(deviceId, "authentication failed", false);
      },
    };
    const report = await makeRunner(source).run(["R1"]);
    expect(calls).toBe(1);
    expect(report.unreachable).toEqual([{ deviceId: "R1", reason: "authentication failed" }]);
  });

  it("gives up after the last attempt", async () => {
    let calls = 0;
    const source: ConfigSource = {
      async fetch() {
        calls++;
        throw new Error("socket hang up");
      },
    };
    const report = await makeRunner(source).run(["R1"]);
    expect(calls).toBe(3);
    expect(report.unreachable).toEqual([{ deviceId: "R1", reason: "socket hang up" }]);
  });

  it("times out a retrieval that never completes", async () => {
    let aborted = false;
    const source: ConfigSource = {
      fetch(_deviceId, signal) {
        signal?.addEventListener("abort", () => {
          aborted = true;
        });
        return new Promise<string>(() => {});
      },
    };
    const report = await makeRunner(source, { timeoutMs: 20, retry: { maxAttempts: 1 } }).run(["R1"]);
    expect(report.unreachable).toEqual([{ deviceId: "R1", reason: "Timed out after 20ms" }]);
    expect(aborted).toBe(true);
  });

  it("bounds the number of concurrent retrievals", async () => {
    let active = 0;
    let peak = 0;
    const source: ConfigSource = {
      async fetch() {
        active++;
        peak = Math.max(peak, active);
        await delay(10);
        active--;
        return COMPLIANT_CONFIG;
      },
    };
    const report = await makeRunner(source, { concurrency: 2 }).run(["a", "b", "c", "d", "e"]);
    expect(report.devices).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it("audits a device listed twice only once", async () => {
    const source = new StaticConfigSource({ R1: COMPLIANT_CONFIG });
    const report = await makeRunner(source).run(["R1", "R1"]);
    expect(report.devices.map((d) => d.deviceId)).toEqual(["R1"]);
  });

  it("returns an empty report for an empty fleet", async () => {
    const report = await makeRunner(new StaticConfigSource({})).run([]);
    expect(report.devices).toEqual([]);
    expect(report.totals.devices).toBe(0);
  });
});
