// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment validation and the typed deployment configuration, using Zod.
 * Scope: Validates process.env; provides lazy cached access. Does not read files.
 * Invariants: All required vars validated on first access; addresses checksummed; amounts parsed to bigint; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: FEE_RECIPIENTS and FEE_BPS are comma lists and must have the same length (checked by the fee schedule at deployment).
 *        Lazy init prevents import-time access.
 * @public
 */

import { type Address, getAddress, isAddress } from "viem";
import { type ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const address = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "not an address")
  .transform((value): Address => getAddress(value));

const uint = z
  .string()
  .regex(/^\d+$/, "not an unsigned integer")
  .transform((value) => BigInt(value));

function commaList<T extends z.ZodTypeAny>(item: T) {
  return z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    )
    .pipe(z.array(item).min(1));
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("exercise-engine"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Roles
  OWNER: address,
  OT_TOKEN_ADMIN: address,

  // Options token
  OT_NAME: z.string().min(1).default("Options Token"),
  OT_SYMBOL: z.string().min(1).default("oTOKEN"),
  OT_PAYMENT_TOKEN: address,
  OT_UNDERLYING_TOKEN: address,

  // Oracle
  ORACLE_SECS: uint.default("1800"),
  ORACLE_MIN_PRICE: uint.default("0"),

  // Discount exercise
  MULTIPLIER: uint.default("5000"),
  FEE_RECIPIENTS: commaList(address),
  FEE_BPS: commaList(uint),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
};

/** invalid_type means the key was absent; everything else is a bad value. */
function classifyIssues(error: ZodError): EnvValidationMeta {
  const missing = new Set<string>();
  const invalid = new Set<string>();
  for (const issue of error.issues) {
    const key = issue.path[0];
    if (key === undefined) continue;
    (issue.code === "invalid_type" ? missing : invalid).add(String(key));
  }
  return { code: "INVALID_ENV", missing: [...missing], invalid: [...invalid] };
}

let cached: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (cached !== null) return cached;

  const result = serverSchema.safeParse(process.env);
  if (!result.success) {
    throw new EnvValidationError(classifyIssues(result.error));
  }
  const env = result.data;
  cached = {
    ...env,
    isDev: env.NODE_ENV === "development",
    isTest: env.NODE_ENV === "test",
    isProd: env.NODE_ENV === "production",
  };
  return cached;
}

/** Validate eagerly, e.g. at process start. */
export function ensureServerEnv(): void {
  serverEnv();
}

export type { ServerEnv };
