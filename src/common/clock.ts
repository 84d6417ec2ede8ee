export const CLOCK = Symbol('CLOCK');
export const RANDOM = Symbol('RANDOM');

export interface Clock {
  now(): Date;
}

/** Uniform float in [0, 1). */
export type RandomSource = () => number;

export const systemClock: Clock = { now: () => new Date() };

export const secondsBetween = (from: Date, to: Date) => (to.getTime() - from.getTime()) / 1000;
