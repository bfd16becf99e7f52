export interface Clock {
  now(): Date;
}

const systemClock: Clock = {
  now: () => new Date(),
};

let activeClock: Clock = systemClock;

export function now(): Date {
  return activeClock.now();
}

export function nowIso(): string {
  return activeClock.now().toISOString();
}

/** Swap the clock (tests). Pass nothing to restore the system clock. */
export function setClock(clock?: Clock): void {
  activeClock = clock ?? systemClock;
}
