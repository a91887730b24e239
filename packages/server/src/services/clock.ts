/**
 * Time source for all issuance and expiry arithmetic
 */
export interface IClock {
  now(): Date;
}

export const systemClock: IClock = {
  now: () => new Date(),
};

/**
 * Add seconds to an instant
 */
export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Unix time in whole seconds
 */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
