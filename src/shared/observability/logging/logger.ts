// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory for the exercise engine; JSON lines on stdout.
 * Scope: Build root loggers and stringify bigint fields. Does not bind operation context (see context/factory).
 * Invariants:
 * - Output is one JSON object per line on fd 1; no worker transports.
 * - Any top-level bigint field is written as a decimal string.
 * - Reads NODE_ENV, PINO_LOG_LEVEL and SERVICE_NAME directly so it never triggers serverEnv() validation.
 * Side-effects: none
 * Links: REDACT_PATHS; used by the container and feature services.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

interface LoggerSettings {
  readonly level: string;
  readonly service: string;
  readonly silent: boolean;
  readonly production: boolean;
}

function readSettings(): LoggerSettings {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  return {
    level: process.env.PINO_LOG_LEVEL ?? "info",
    service: process.env.SERVICE_NAME ?? "exercise-engine",
    silent: process.env.VITEST === "true" || nodeEnv === "test",
    production: nodeEnv === "production",
  };
}

/** Token amounts are bigint; JSON has no such type. */
export function stringifyBigints(
  fields: Record<string, unknown>
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const settings = readSettings();

  return pino(
    {
      level: settings.level,
      enabled: !settings.silent,
      // reserved keys last so bindings cannot shadow them
      base: { ...bindings, app: "optex-node", service: settings.service },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
      formatters: { log: stringifyBigints },
    },
    pino.destination({
      dest: 1,
      sync: !settings.production,
      minLength: 4096,
    })
  );
}

/** Silenced pino instance with the real Logger type. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
