import type { ComplianceEngine } from "../compliance/engine.js";
import { aggregate } from "../compliance/report.js";
import type {
  DeviceAuditResult,
  FleetReport,
  UnreachableDevice,
} from "../compliance/types.js";
import type { Logger } from "../logging/logger.js";
import { retry, type RetryOptions } from "../utils/retry.js";
import { RetrievalError, type ConfigSource } from "./config-source.js";

export type DeviceOutcome =
  | { readonly kind: "audited"; readonly result: DeviceAuditResult }
  | { readonly kind: "unreachable"; readonly device: UnreachableDevice };

export interface AuditRunnerOptions {
  readonly concurrency?: number;
  readonly timeoutMs?: number;
  readonly retry?: RetryOptions;
}

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

/**
 * Audits a fleet: fetches each device's configuration with bounded
 * concurrency, retry and timeout, then evaluates it against the shared
 * template. A device whose configuration cannot be fetched is reported
 * as unreachable; it never aborts the rest of the run.
 */
export class AuditRunner {
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly retryOpts: RetryOptions;

  constructor(
    private readonly engine: ComplianceEngine,
    private readonly source: ConfigSource,
    logger: Logger,
    options?: AuditRunnerOptions,
  ) {
    this.logger = logger.child({ component: "audit-runner" });
    this.concurrency = Math.max(1, options?.concurrency ?? DEFAULT_CONCURRENCY);
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryOpts = options?.retry ?? DEFAULT_RETRY;
  }

  async run(deviceIds: readonly string[]): Promise<FleetReport> {
    const ids = [...new Set(deviceIds)];
    if (ids.length !== deviceIds.length) {
      this.logger.warn({ submitted: deviceIds.length, unique: ids.length }, "Duplicate device ids ignored");
    }

    this.logger.info(
      { devices: ids.length, template: this.engine.template.name, concurrency: this.concurrency },
      "Starting compliance audit",
    );

    const outcomes = new Array<DeviceOutcome>(ids.length);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < ids.length) {
        const index = next++;
        outcomes[index] = await this.auditDevice(ids[index]);
      }
    };
    await Promise.all(
      Array.from({ length: Math.min(this.concurrency, ids.length) }, () => worker()),
    );

    const results: DeviceAuditResult[] = [];
    const unreachable: UnreachableDevice[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === "audited") results.push(outcome.result);
      else unreachable.push(outcome.device);
    }

    const report = aggregate(results, unreachable);
    this.logger.info(
      {
        compliant: report.totals.compliant,
        nonCompliant: report.totals.nonCompliant,
        unreachable: report.totals.unreachable,
        violations: report.totals.violations,
      },
      "Compliance audit finished",
    );
    return report;
  }

  async auditDevice(deviceId: string): Promise<DeviceOutcome> {
    let config: string;
    try {
      config = await retry(
        (attempt) => {
          if (attempt > 0) this.logger.debug({ device: deviceId, attempt }, "Retrying config retrieval");
          return this.fetchWithTimeout(deviceId);
        },
        {
          ...this.retryOpts,
          shouldRetry: (err) => !(err instanceof RetrievalError) || err.retriable,
        },
      );
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn({ device: deviceId, err }, "Configuration unavailable, device marked unreachable");
      return { kind: "unreachable", device: { deviceId, reason } };
    }

    const result = this.engine.audit(deviceId, config);
    this.logger.info(
      { device: deviceId, status: result.status, violations: result.violations.length },
      "Device audited",
    );
    return { kind: "audited", result };
  }

  private async fetchWithTimeout(deviceId: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new RetrievalError(deviceId, `Timed out after ${this.timeoutMs}ms`, true));
    }, this.timeoutMs);

    try {
      return await new Promise<string>((resolve, reject) => {
        controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
        this.source.fetch(deviceId, controller.signal).then(resolve, reject);
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
