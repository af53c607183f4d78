/**
 * Source of the current instant.
 * Injected into the ledger so tests can pin time without touching Date.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
