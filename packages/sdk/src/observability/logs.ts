/**
 * Structured logging for registry, loader and cache operations
 *
 * One line per event: `[timestamp] [LEVEL] [event] type message {details}`.
 * Debug lines print only when TYPEREG_DEBUG is set.
 */

export type LogLevel = "debug" | "warn";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Content type or cache/data path the event concerns */
  type?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Pick<LogEntry, "type" | "message" | "details">;

export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.type) parts.push(entry.type);
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(JSON.stringify(entry.details));
  return parts.join(" ");
}

class Logger {
  #enabled = true;

  debug(event: string, fields: LogFields = {}): void {
    if (!process.env.TYPEREG_DEBUG) return;
    this.#write("debug", event, fields);
  }

  warn(event: string, fields: LogFields = {}): void {
    this.#write("warn", event, fields);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  get enabled(): boolean {
    return this.#enabled;
  }

  #write(level: LogLevel, event: string, fields: LogFields): void {
    if (!this.#enabled) return;

    const line = formatEntry({ timestamp: new Date().toISOString(), level, event, ...fields });
    if (level === "debug") {
      console.debug(line);
    } else {
      console.warn(line);
    }
  }
}

export const logger = new Logger();
