/**
 * Generic document types exchanged between the client and its callers.
 */

const RFC3339_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Timestamp representation in Firestore.
 * RFC 3339 format with nanosecond precision.
 */
export class Timestamp {
  /** Seconds since Unix epoch */
  readonly seconds: number;
  /** Nanoseconds (0-999,999,999) */
  readonly nanos: number;

  constructor(seconds: number, nanos: number = 0) {
    if (!Number.isSafeInteger(seconds) || !Number.isInteger(nanos) || nanos < 0 || nanos > 999_999_999) {
      throw new RangeError(`Invalid timestamp: ${seconds}s ${nanos}ns`);
    }
    this.seconds = seconds;
    this.nanos = nanos;
  }

  static fromDate(date: Date): Timestamp {
    const millis = date.getTime();
    const seconds = Math.floor(millis / 1000);
    return new Timestamp(seconds, (millis - seconds * 1000) * 1_000_000);
  }

  /**
   * Parse an RFC 3339 timestamp, keeping up to nine fractional digits.
   * @returns The timestamp, or null when the text is not RFC 3339
   */
  static parse(text: string): Timestamp | null {
    const match = RFC3339_PATTERN.exec(text);
    if (!match) return null;
    const [, base, fraction = "", offset] = match;
    const millis = Date.parse(`${base}${offset}`);
    if (Number.isNaN(millis)) return null;
    return new Timestamp(millis / 1000, Number(fraction.padEnd(9, "0")));
  }

  /**
   * Convert to a Date; digits below the millisecond are dropped.
   */
  toDate(): Date {
    return new Date(this.seconds * 1000 + Math.floor(this.nanos / 1_000_000));
  }

  /**
   * Format as UTC RFC 3339 with 0, 3, 6 or 9 fractional digits.
   */
  toRFC3339(): string {
    const base = new Date(this.seconds * 1000).toISOString().slice(0, 19);
    if (this.nanos === 0) return `${base}Z`;
    let fraction = this.nanos.toString().padStart(9, "0");
    while (fraction.endsWith("000")) {
      fraction = fraction.slice(0, -3);
    }
    return `${base}.${fraction}Z`;
  }

  isEqual(other: Timestamp): boolean {
    return this.seconds === other.seconds && this.nanos === other.nanos;
  }

  toString(): string {
    return this.toRFC3339();
  }
}

/**
 * A document field value.
 *
 * `bigint` is the 64-bit integer kind and `number` the double kind; the
 * two map to different wire discriminators and never convert into each other.
 * Timestamps read from the store are {@link Timestamp}s; a `Date` is accepted
 * on write.
 */
export type DocumentValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | Date
  | Timestamp
  | DocumentValue[]
  | DocumentData;

/**
 * A document: field name to value. Documents read back from the store also
 * carry an `id` taken from their resource name.
 */
export interface DocumentData {
  [field: string]: DocumentValue;
}

/**
 * Equality filters for a query, field path to expected value.
 */
export type EqualityFilters = Record<string, DocumentValue>;

