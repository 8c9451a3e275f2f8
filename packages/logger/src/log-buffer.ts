import pino from "pino";

export interface BufferedLogEntry {
  timestamp: string;
  level: string;
  /** The `component` binding of the logger, else its name. */
  category: string;
  message: string;
  error: string | null;
}

export interface LogQuery {
  /** How many of the newest entries to look at before filtering. */
  count?: number;
  /** Exact level label, any case. */
  level?: string;
  /** Substring of the category, any case. */
  category?: string;
}

export const DEFAULT_LOG_BUFFER_CAPACITY = 2_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

function levelLabel(value: unknown): string {
  if (typeof value === "number") return pino.levels.labels[value] ?? String(value);
  return typeof value === "string" ? value : "info";
}

function errorText(record: Record<string, unknown>): string | null {
  const err = record["err"];
  if (isRecord(err)) {
    return stringField(err, "stack") ?? stringField(err, "message") ?? null;
  }
  return stringField(record, "error") ?? null;
}

function toEntry(line: string): BufferedLogEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    parsed = undefined;
  }
  if (!isRecord(parsed)) {
    return { timestamp: new Date().toISOString(), level: "info", category: "", message: line.trim(), error: null };
  }

  const time = parsed["time"];
  return {
    timestamp:
      typeof time === "string" ? time : typeof time === "number" ? new Date(time).toISOString() : new Date().toISOString(),
    level: levelLabel(parsed["level"]),
    category: stringField(parsed, "component") ?? stringField(parsed, "name") ?? "",
    message: stringField(parsed, "msg") ?? "",
    error: errorText(parsed),
  };
}

/**
 * Keeps the most recent log lines in memory for remote diagnostics. Pass it
 * to `createLogger({ buffer })`; pino writes each serialized line here.
 */
export class LogBuffer implements pino.DestinationStream {
  private entries: BufferedLogEntry[] = [];

  constructor(
    readonly capacity: number = DEFAULT_LOG_BUFFER_CAPACITY,
    /** Lines below this level are not kept. */
    readonly minLevel: pino.Level = "info",
  ) {}

  write(line: string): void {
    this.entries.push(toEntry(line));
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /**
   * The newest `count` entries, oldest first, narrowed by level and category.
   */
  query(query: LogQuery = {}): BufferedLogEntry[] {
    const count = Math.max(0, query.count ?? this.capacity);
    const level = query.level?.toLowerCase();
    const category = query.category?.toLowerCase();

    return this.entries
      .slice(Math.max(0, this.entries.length - count))
      .filter((entry) => level === undefined || entry.level.toLowerCase() === level)
      .filter((entry) => category === undefined || entry.category.toLowerCase().includes(category));
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
