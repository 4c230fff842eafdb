/** Source of the current time in Unix seconds, read once per transaction as its block timestamp. */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: bigint) {}

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    this.current = timestamp;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}
