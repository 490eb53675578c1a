// src/lib/logger.ts
// Console logging with a scope prefix, plus the human-readable scenario journal lines.

export type JournalEntry = { t: string; msg: string };

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (msg: string, ...meta: unknown[]) => void>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function isLogLevel(v: unknown): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

export function now() {
  const d = new Date();
  return d.toLocaleTimeString([], { hour: "2-digit", minute: "2-digit", second: "2-digit" });
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel) => (msg: string, ...meta: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const line = `[${now()}] [${scope}] ${msg}`;
    if (level === "error") console.error(line, ...meta);
    else if (level === "warn") console.warn(line, ...meta);
    else if (level === "debug") console.debug(line, ...meta);
    else console.info(line, ...meta);
  };
  return { debug: emit("debug"), info: emit("info"), warn: emit("warn"), error: emit("error") };
}

export function formatSliderChange(
  label: string,
  from: number,
  to: number,
  fmt: (v: number) => string = String
) {
  return `[${now()}] ${label}: ${fmt(from)} → ${fmt(to)}`;
}

export function formatToggle(name: string, on: boolean) {
  return `[${now()}] ${name}: ${on ? "ON" : "OFF"}`;
}

export function formatWalletLookup(address: string, outcome: string) {
  return `[${now()}] wallet ${address}: ${outcome}`;
}

export function formatSetting(label: string, value: string) {
  return `[${now()}] ${label}: ${value}`;
}
