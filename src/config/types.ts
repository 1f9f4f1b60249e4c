export type LogLevel = "debug" | "info" | "warn" | "error";

export interface NetcomplyConfig {
  readonly logging: LoggingConfig;
  readonly audit: AuditConfig;
  readonly retry: RetryConfig;
  readonly devices: string[];
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}

export interface AuditConfig {
  readonly templatePath: string;
  readonly configDir: string;
  readonly reportDir: string;
  readonly concurrency: number;
  readonly timeoutMs: number;
  readonly export: boolean;
}

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}
