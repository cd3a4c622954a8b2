// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Verifies operation contexts keep valid correlation ids, replace unsafe ones and bind them to the child logger.
 * Scope: createOperationContext only.
 * Side-effects: none
 * Links: src/shared/observability/context/factory.ts
 * @public
 */

import { captureLogs, FakeClock } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { createOperationContext } from "@/shared/observability";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("createOperationContext", () => {
  it("keeps a well-formed reqId and binds it with the operation", () => {
    const { log, lines } = captureLogs();
    const clock = new FakeClock();
    const ctx = createOperationContext(
      { baseLog: log, clock },
      { operation: "exercise", reqId: "abc_DEF-123" }
    );

    expect(ctx.reqId).toBe("abc_DEF-123");
    expect(ctx.clock).toBe(clock);
    ctx.log.info("hello");
    expect(lines).toEqual([
      { level: 30, reqId: "abc_DEF-123", operation: "exercise", msg: "hello" },
    ]);
  });

  it.each([
    ["missing", undefined],
    ["with spaces", "bad id"],
    ["with injection characters", 'x"\n{'],
    ["too long", "a".repeat(65)],
  ])("replaces a %s reqId with a UUID", (_label, reqId) => {
    const { log } = captureLogs();
    const ctx = createOperationContext(
      { baseLog: log, clock: new FakeClock() },
      { operation: "claim", reqId }
    );
    expect(ctx.reqId).toMatch(UUID);
  });

  it("accepts a 64-character reqId", () => {
    const { log } = captureLogs();
    const reqId = "a".repeat(64);
    const ctx = createOperationContext(
      { baseLog: log, clock: new FakeClock() },
      { operation: "claim", reqId }
    );
    expect(ctx.reqId).toBe(reqId);
  });
});
