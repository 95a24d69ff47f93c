/** Source of the current time for every timestamp the core writes or compares. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
