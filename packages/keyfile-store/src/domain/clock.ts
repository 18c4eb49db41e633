export interface IClock {
	/** Current time in epoch milliseconds. */
	now(): number;
}

export const systemClock: IClock = {
	now: () => Date.now(),
};
