import { readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { isNotFound } from "../config/loader.js";

/** Yields the raw running configuration of a device. */
export interface ConfigSource {
  fetch(deviceId: string, signal?: AbortSignal): Promise<string>;
}

export class RetrievalError extends Error {
  override readonly name = "RetrievalError";

  constructor(
    readonly deviceId: string,
    message: string,
    readonly retriable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export const CONFIG_EXTENSIONS = [".cfg", ".txt"] as const;

/**
 * Reads configurations saved as `<dir>/<deviceId>.cfg` (or `.txt`),
 * e.g. the output of `show running-config` captured by another tool.
 */
export class DirectoryConfigSource implements ConfigSource {
  constructor(
    private readonly dir: string,
    private readonly extensions: readonly string[] = CONFIG_EXTENSIONS,
  ) {}

  async fetch(deviceId: string, signal?: AbortSignal): Promise<string> {
    if (deviceId.length === 0 || basename(deviceId) !== deviceId) {
      throw new RetrievalError(deviceId, `Invalid device id: '${deviceId}'`, false);
    }

    for (const ext of this.extensions) {
      const file = join(this.dir, `${deviceId}${ext}`);
      try {
        return await readFile(file, { encoding: "utf-8", signal });
      } catch (err) {
        if (isNotFound(err)) continue;
        throw new RetrievalError(
          deviceId,
          `Failed to read ${file}: ${err instanceof Error ? err.message : String(err)}`,
          true,
          { cause: err },
        );
      }
    }

    throw new RetrievalError(deviceId, `No configuration found for ${deviceId} in ${this.dir}`, false);
  }
}

/** In-memory configurations, for simulation runs and embedding. */
export class StaticConfigSource implements ConfigSource {
  private readonly configs: ReadonlyMap<string, string>;

  constructor(configs: Readonly<Record<string, string>>) {
    this.configs = new Map(Object.entries(configs));
  }

  async fetch(deviceId: string): Promise<string> {
    const config = this.configs.get(deviceId);
    if (config === undefined) {
      throw new RetrievalError(deviceId, `Configuration not found for ${deviceId}`, false);
    }
    return config;
  }

  deviceIds(): string[] {
    return [...this.configs.keys()];
  }
}
