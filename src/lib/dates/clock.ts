/** Source of the current wall-clock time for `today()` and `now()`. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Clock frozen at `instant`. */
export const fixedClock = (instant: Date): Clock => {
  const frozen = instant.getTime();
  return {
    now: () => new Date(frozen),
  };
};
