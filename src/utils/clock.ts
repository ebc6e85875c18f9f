export interface Clock {
  now(): number;
}

export const WallClock: Clock = {
  now: () => Date.now(),
};

export const elapsedSince = (clock: Clock, since: number): number =>
  clock.now() - since;
