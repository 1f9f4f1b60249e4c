import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isNotFound, loadConfig, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TEMPLATE"] = "templates/test.yaml";
    process.env["TEST_DIR"] = "/tmp/configs";
  });

  afterEach(() => {
    delete process.env["TEST_TEMPLATE"];
    delete process.env["TEST_DIR"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("template: ${env:TEST_TEMPLATE}")).toBe(
      "template: templates/test.yaml",
    );
  });

  it("substitutes multiple env vars", () => {
    expect(
      substituteEnv("${env:TEST_DIR}:${env:TEST_TEMPLATE}"),
    ).toBe("/tmp/configs:templates/test.yaml");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("parses minimal config with defaults", () => {
    const config = parseConfig({});
    expect(config.logging.level).toBe("info");
    expect(config.audit).toEqual({
      templatePath: "templates/cisco_ios_golden_config.yaml",
      configDir: "configs",
      reportDir: "reports",
      concurrency: 4,
      timeoutMs: 30_000,
      export: true,
    });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 10_000 });
    expect(config.devices).toEqual([]);
  });

  it("parses full config", () => {
    const config = parseConfig({
      logging: { level: "debug", json: true },
      audit: { configDir: "/srv/configs", concurrency: 8, export: false },
      devices: ["Router1", "Switch1"],
    });
    expect(config.logging.level).toBe("debug");
    expect(config.audit.configDir).toBe("/srv/configs");
    expect(config.audit.concurrency).toBe(8);
    expect(config.audit.export).toBe(false);
    expect(config.audit.reportDir).toBe("reports");
    expect(config.devices).toEqual(["Router1", "Switch1"]);
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => parseConfig({ audit: { concurrency: 0 } })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ logging: { level: "trace" } })).toThrow();
  });

  it("rejects empty device ids", () => {
    expect(() => parseConfig({ devices: [""] })).toThrow();
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "netcomply-config-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(tempDir, "missing.json"));
    expect(config.audit.concurrency).toBe(4);
  });

  it("reads and validates a config file", () => {
    const path = join(tempDir, "netcomply.config.json");
    writeFileSync(path, JSON.stringify({ devices: ["R1"], retry: { maxAttempts: 5 } }));
    const config = loadConfig(path);
    expect(config.devices).toEqual(["R1"]);
    expect(config.retry.maxAttempts).toBe(5);
  });

  it("rethrows malformed JSON", () => {
    const path = join(tempDir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(SyntaxError);
  });
});

describe("isNotFound", () => {
  it("recognizes ENOENT errors only", () => {
    expect(isNotFound(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe(true);
    expect(isNotFound(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
    expect(isNotFound("ENOENT")).toBe(false);
  });
});
