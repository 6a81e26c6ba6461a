/**
 * Integer env value, or `fallback` when it is missing or does not parse to an integer >= `min`.
 */
export function intFromEnv(value: string | undefined, fallback: number, min = 0): number {
	if (value === undefined || !value.trim()) return fallback;
	const parsed = parseInt(value, 10);
	return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}
