// Verify Kernel - logging
//
// pino structured logs. Without an injected logger the kernel stays silent.

import { pino } from "pino";
import type { LevelWithSilent, Logger } from "pino";

export type VerifyLogger = Logger;

export function createLogger(options: { level?: LevelWithSilent; name?: string } = {}): VerifyLogger {
  return pino({ name: options.name ?? "rulecheck", level: options.level ?? "info" });
}

export function silentLogger(): VerifyLogger {
  return pino({ level: "silent" });
}
