/**
 * Injectable wall clock. Retention windows are measured against it, so
 * tests pin "now" instead of depending on the date they run.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function fixedClock(now: number): Clock {
	return () => now;
}
