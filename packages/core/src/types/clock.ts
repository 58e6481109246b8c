/** Returns the current time in epoch seconds. May be fractional. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
