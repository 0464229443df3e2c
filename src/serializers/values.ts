/**
 * Value types with built-in serializers, besides the global `Date`.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A point in time bound to a time zone.
 */
export class Calendar {
  constructor(
    readonly timeInMillis: number,
    readonly timeZone: string = 'UTC'
  ) {}

  toDate(): Date {
    return new Date(this.timeInMillis);
  }
}

/**
 * A calendar day. The time is truncated to UTC midnight.
 */
export class DateOnly extends Date {
  constructor(time: number) {
    super(Math.floor(time / DAY_MS) * DAY_MS);
  }
}

/**
 * A filesystem path.
 */
export class FilePath {
  constructor(readonly path: string) {}

  toString(): string {
    return this.path;
  }
}
