/**
 * Injectable time source, epoch milliseconds.
 */
export interface ClockSource {
  now(): number;
}

export const RealClock: ClockSource = {
  now: () => Date.now(),
};
