export interface LogContext {
  request_id?: string;
  subject?: string;
  role?: string;
}

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export interface LogOptions {
  context?: LogContext;
  data?: Record<string, unknown>;
}

const SERVICE_NAME = "rbac-gatekeeper";

export function buildLogEntry(input: {
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level: input.level,
    message: input.message,
    service: SERVICE_NAME,
    ...(input.context ? { context: input.context } : {}),
    ...(input.data ? { data: input.data } : {})
  };
}

export function logInfo(message: string, options?: LogOptions): void {
  process.stdout.write(`${JSON.stringify(buildLogEntry({ level: "info", message, ...options }))}\n`);
}

export function logWarn(message: string, options?: LogOptions): void {
  process.stderr.write(`${JSON.stringify(buildLogEntry({ level: "warn", message, ...options }))}\n`);
}

export function logError(message: string, options?: LogOptions): void {
  process.stderr.write(`${JSON.stringify(buildLogEntry({ level: "error", message, ...options }))}\n`);
}
