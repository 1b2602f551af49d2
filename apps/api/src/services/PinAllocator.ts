import { randomInt } from "node:crypto";
import { PIN_LENGTH } from "@livequiz/shared";
import { logEvent } from "../lib/logger";
import type { SessionStore } from "./SessionStore";
import type { EngineResult } from "./session-types";
import { fail, succeed } from "./session-types";

type PinAllocatorOptions = {
  maxAttempts: number;
  capacityRatio: number;
  pinLength?: number;
  random?: (maxExclusive: number) => number;
};

/** Marks a candidate PIN as in flight before the store sees it, and clears the mark if it is not taken. */
export type PinHold = {
  hold(pin: string): void;
  drop(pin: string): void;
};

export function formatPin(value: number, length = PIN_LENGTH) {
  return String(value).padStart(length, "0");
}

export class PinAllocator {
  private readonly store: SessionStore;
  private readonly maxAttempts: number;
  private readonly capacityRatio: number;
  private readonly pinLength: number;
  private readonly random: (maxExclusive: number) => number;

  constructor(store: SessionStore, options: PinAllocatorOptions) {
    this.store = store;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.capacityRatio = options.capacityRatio;
    this.pinLength = options.pinLength ?? PIN_LENGTH;
    this.random = options.random ?? ((maxExclusive) => randomInt(maxExclusive));
  }

  pinSpace() {
    return 10 ** this.pinLength;
  }

  async allocate(holder?: PinHold): Promise<EngineResult<string>> {
    const active = (await this.store.activePins()).length;
    const capacity = Math.floor(this.pinSpace() * this.capacityRatio);
    if (active >= capacity) {
      logEvent("warn", "pin_allocation_capacity_reached", { active, capacity });
      return fail("ALLOCATION_EXHAUSTED", "no session PIN is available right now");
    }

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const pin = formatPin(this.random(this.pinSpace()), this.pinLength);
      holder?.hold(pin);
      let reserved = false;
      try {
        reserved = await this.store.reservePin(pin);
      } finally {
        if (!reserved) holder?.drop(pin);
      }
      if (reserved) return succeed(pin);
    }

    logEvent("warn", "pin_allocation_exhausted", { active, attempts: this.maxAttempts });
    return fail("ALLOCATION_EXHAUSTED", "no session PIN is available right now");
  }

  async release(pin: string) {
    await this.store.releasePin(pin);
  }
}
