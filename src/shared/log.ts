import { nowLocalIso } from "./time.js";

export type LogLevel = "info" | "warn" | "error";

export type LogWriter = (line: string) => void;

const SAFE_VALUE = /^[A-Za-z0-9._:@/+-]+$/;

// Paths and per-layer counts; only useful when chasing a merge problem.
const DEBUG_ONLY_KEYS = new Set(["workspace", "layer-sources", "user-global-dir", "project-local-dir"]);

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

let debugEnabled = false;
let writer: LogWriter = stderrWriter;

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Redirect log lines; null restores stderr.
 */
export function setLogWriter(next: LogWriter | null): void {
  writer = next ?? stderrWriter;
}

function formatValue(value: unknown): string {
  if (value === null) return "none";
  if (typeof value === "boolean" || typeof value === "number") return String(value);

  const raw = typeof value === "string" ? value : JSON.stringify(value);
  return SAFE_VALUE.test(raw) ? raw : JSON.stringify(raw);
}

/**
 * `ts=… level=… event=… key=value …`. `module-name` is shortened to `module` and
 * `duration-ms` is rendered as `duration=1.5s`; undefined values are left out.
 */
export function formatLogLine(
  level: LogLevel,
  event: string,
  fields: Record<string, unknown> | undefined,
  options: { debug: boolean; ts: string }
): string {
  const parts: string[] = [`ts=${options.ts}`, `level=${level}`, `event=${event}`];

  for (const [key, value] of Object.entries(fields ?? {})) {
    if (value === undefined) continue;
    if (!options.debug && DEBUG_ONLY_KEYS.has(key)) continue;

    if (key === "module-name") {
      parts.push(`module=${formatValue(value)}`);
    } else if (key === "duration-ms" && typeof value === "number") {
      parts.push(`duration=${(value / 1000).toFixed(1)}s`);
    } else {
      parts.push(`${key}=${formatValue(value)}`);
    }
  }

  return parts.join(" ");
}

export function logEvent(level: LogLevel, event: string, fields?: Record<string, unknown>): void {
  writer(formatLogLine(level, event, fields, { debug: debugEnabled, ts: nowLocalIso() }));
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || "unknown error";
  if (typeof err === "string") return err || "unknown error";
  try {
    return JSON.stringify(err);
  } catch {
    return "unknown error";
  }
}
