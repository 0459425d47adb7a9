export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const DAY_MS = 24 * 60 * 60 * 1000;

export const isoNow = (clock: Clock = systemClock): string => new Date(clock()).toISOString();

export const toIso = (epochMs: number): string => new Date(epochMs).toISOString();

export const fromIso = (iso: string): number => new Date(iso).getTime();
