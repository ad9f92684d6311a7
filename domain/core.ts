/**
 * Domain core — structural primitives only.
 * Framework-independent. No business assumptions.
 */

// --- Branded scalars (safer than plain numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Point in time (UTC epoch milliseconds). */
export type Timestamp = Brand<number, "TimestampMs">;

/** Span of play time (whole seconds). */
export type Duration = Brand<number, "DurationSec">;

// --- Constructors (no validation yet) ---

export const asTimestamp = (ms: number) => ms as Timestamp;
export const asDuration = (seconds: number) => seconds as Duration;

/** Timestamp from unix seconds, as found in submission files. */
export const timestampFromUnixSeconds = (seconds: number) => asTimestamp(seconds * 1000);

/** Unix seconds of a timestamp, truncated. */
export const toUnixSeconds = (ts: Timestamp) => Math.floor(ts / 1000);
