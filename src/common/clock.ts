export interface Clock {
  now(): string;
}

export const CLOCK = Symbol('CLOCK');

export const now = (): string => new Date().toISOString();

export const systemClock: Clock = { now };
