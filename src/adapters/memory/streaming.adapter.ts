// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/memory/streaming`
 * Purpose: Token lockup service with linear (cliff) and segmented (curved) release streams.
 * Scope: Implements StreamingService plus streamedAmountOf/getStream for inspection.
 * Invariants:
 * - Stream ids start at 1 and increase by one; id 0 is never issued.
 * - streamed(t) is non-decreasing and never exceeds the deposit; withdrawn <= streamed.
 * - Only the recipient withdraws and only the sender cancels; a cancel refunds the unstreamed remainder and freezes streamed.
 * Side-effects: none (in-memory state)
 * Notes: Fractional segment exponents are evaluated in floating point; integer exponents are exact.
 * Links: Implements StreamingService port
 * @public
 */

import {
  InvalidStreamError,
  type Journal,
  JournaledMap,
  JournaledValue,
  mulDivDown,
  mulWadDown,
  sameAddress,
  type StreamSegment,
  WAD,
} from "@optex/exercise-core";
import type { Address } from "viem";

import type {
  Clock,
  CreateLinearStreamParams,
  CreateSegmentedStreamParams,
  StreamingService,
} from "@/ports";

import type { InMemoryTokenLedger } from "./token-ledger.adapter";

export type StreamShape =
  | { readonly kind: "linear"; readonly cliffTime: bigint; readonly endTime: bigint }
  | { readonly kind: "segmented"; readonly segments: readonly StreamSegment[] };

export interface Stream {
  readonly id: bigint;
  readonly sender: Address;
  readonly recipient: Address;
  readonly token: Address;
  readonly amount: bigint;
  readonly startTime: bigint;
  readonly shape: StreamShape;
  readonly withdrawn: bigint;
  /** Streamed amount frozen at cancellation */
  readonly canceledStreamed?: bigint;
}

export interface InMemoryStreamingServiceConfig {
  readonly address: Address;
  readonly ledger: InMemoryTokenLedger;
  readonly clock: Clock;
  readonly journal: Journal;
}

export class InMemoryStreamingService implements StreamingService {
  readonly address: Address;
  private readonly streams: JournaledMap<bigint, Stream>;
  private readonly nextId: JournaledValue<bigint>;

  constructor(private readonly config: InMemoryStreamingServiceConfig) {
    this.address = config.address;
    this.streams = new JournaledMap(config.journal);
    this.nextId = new JournaledValue(config.journal, 1n);
  }

  createLinearStream(sender: Address, params: CreateLinearStreamParams): bigint {
    if (params.totalDuration <= 0n) {
      throw new InvalidStreamError("total duration must be positive");
    }
    if (params.cliffDuration < 0n || params.cliffDuration > params.totalDuration) {
      throw new InvalidStreamError("cliff must lie within the total duration");
    }
    const startTime = this.config.clock.now();
    return this.open(sender, params, {
      kind: "linear",
      cliffTime: startTime + params.cliffDuration,
      endTime: startTime + params.totalDuration,
    });
  }

  createSegmentedStream(
    sender: Address,
    params: CreateSegmentedStreamParams
  ): bigint {
    if (params.segments.length === 0) {
      throw new InvalidStreamError("at least one segment is required");
    }
    const total = params.segments.reduce((sum, s) => sum + s.amount, 0n);
    if (total !== params.amount) {
      throw new InvalidStreamError(
        `segment amounts sum to ${total}, deposit is ${params.amount}`
      );
    }
    if (params.segments.some((s) => s.duration <= 0n || s.amount < 0n)) {
      throw new InvalidStreamError("segments need positive durations");
    }
    return this.open(sender, params, {
      kind: "segmented",
      segments: [...params.segments],
    });
  }

  getStream(streamId: bigint): Stream {
    const stream = this.streams.get(streamId);
    if (!stream) {
      throw new InvalidStreamError(`stream ${streamId} does not exist`);
    }
    return stream;
  }

  streamedAmountOf(streamId: bigint): bigint {
    const stream = this.getStream(streamId);
    if (stream.canceledStreamed !== undefined) {
      return stream.canceledStreamed;
    }
    const elapsed = this.config.clock.now() - stream.startTime;
    return stream.shape.kind === "linear"
      ? linearStreamed(stream, stream.shape, elapsed)
      : segmentedStreamed(stream.shape.segments, elapsed);
  }

  withdrawableAmountOf(streamId: bigint): bigint {
    return this.streamedAmountOf(streamId) - this.getStream(streamId).withdrawn;
  }

  withdraw(caller: Address, streamId: bigint, to: Address, amount: bigint): void {
    this.config.journal.atomic(() => {
      const stream = this.getStream(streamId);
      if (!sameAddress(caller, stream.recipient)) {
        throw new InvalidStreamError(`${caller} is not the stream recipient`);
      }
      const withdrawable = this.withdrawableAmountOf(streamId);
      if (amount <= 0n || amount > withdrawable) {
        throw new InvalidStreamError(
          `cannot withdraw ${amount}, ${withdrawable} available`
        );
      }
      this.streams.set(streamId, { ...stream, withdrawn: stream.withdrawn + amount });
      this.config.ledger.transfer(stream.token, this.address, to, amount);
    });
  }

  cancel(caller: Address, streamId: bigint): bigint {
    return this.config.journal.atomic(() => {
      const stream = this.getStream(streamId);
      if (!sameAddress(caller, stream.sender)) {
        throw new InvalidStreamError(`${caller} is not the stream sender`);
      }
      if (stream.canceledStreamed !== undefined) {
        throw new InvalidStreamError(`stream ${streamId} is already canceled`);
      }
      const streamed = this.streamedAmountOf(streamId);
      const refund = stream.amount - streamed;
      this.streams.set(streamId, { ...stream, canceledStreamed: streamed });
      if (refund > 0n) {
        this.config.ledger.transfer(stream.token, this.address, stream.sender, refund);
      }
      return refund;
    });
  }

  private open(
    sender: Address,
    params: { recipient: Address; token: Address; amount: bigint },
    shape: StreamShape
  ): bigint {
    if (params.amount <= 0n) {
      throw new InvalidStreamError("deposit must be positive");
    }
    return this.config.journal.atomic(() => {
      this.config.ledger.transferFrom(
        params.token,
        this.address,
        sender,
        this.address,
        params.amount
      );
      const id = this.nextId.get();
      this.nextId.set(id + 1n);
      this.streams.set(id, {
        id,
        sender,
        recipient: params.recipient,
        token: params.token,
        amount: params.amount,
        startTime: this.config.clock.now(),
        shape,
        withdrawn: 0n,
      });
      return id;
    });
  }
}

function linearStreamed(
  stream: Stream,
  shape: { cliffTime: bigint; endTime: bigint },
  elapsed: bigint
): bigint {
  const now = stream.startTime + elapsed;
  if (now < shape.cliffTime) return 0n;
  if (now >= shape.endTime) return stream.amount;
  return mulDivDown(stream.amount, elapsed, shape.endTime - stream.startTime);
}

function segmentedStreamed(
  segments: readonly StreamSegment[],
  elapsed: bigint
): bigint {
  let streamed = 0n;
  let remaining = elapsed;
  for (const segment of segments) {
    if (remaining >= segment.duration) {
      streamed += segment.amount;
      remaining -= segment.duration;
      continue;
    }
    if (remaining > 0n) {
      const progress = (remaining * WAD) / segment.duration;
      streamed += mulWadDown(segment.amount, powWad(progress, segment.exponent));
    }
    break;
  }
  return streamed;
}

/**
 * base^exponent for 18-decimal base in [0, 1e18] and 18-decimal exponent.
 */
export function powWad(base: bigint, exponent: bigint): bigint {
  const whole = exponent / WAD;
  const fraction = exponent % WAD;

  let result = WAD;
  let square = base;
  for (let n = whole; n > 0n; n /= 2n) {
    if (n % 2n === 1n) result = mulWadDown(result, square);
    square = mulWadDown(square, square);
  }
  if (fraction === 0n) return result;

  const approx = Math.pow(Number(base) / 1e18, Number(fraction) / 1e18);
  const fractional = BigInt(Math.floor(approx * 1e18));
  return mulWadDown(result, fractional > WAD ? WAD : fractional);
}
