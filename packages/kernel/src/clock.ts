/**
 * Helmsman Kernel — Clock
 *
 * Every time-dependent kernel component takes an injected Clock so tests can
 * drive the rolling windows with a synthetic one.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
