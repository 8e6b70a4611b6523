/**
 * Clock abstraction.
 *
 * - `now()` returns the current instant as a `Date`.
 * - `epochSeconds()` returns the current instant as whole Unix seconds,
 *   rounded toward negative infinity.
 */
export interface Clock {
  now(): Date;
  epochSeconds(): number;
}

/** Real wall-clock backed by `Date.now()`. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  epochSeconds(): number {
    return Math.floor(this.now().getTime() / 1000);
  }
}

/** Clock frozen at a specific instant. Useful for deterministic tests. */
export class FixedClock implements Clock {
  private readonly _now: Date;

  constructor(now: Date) {
    this._now = new Date(now.getTime());
  }

  now(): Date {
    return new Date(this._now.getTime());
  }

  epochSeconds(): number {
    return Math.floor(this._now.getTime() / 1000);
  }
}
