import { intFromEnv } from './env.util';

describe('intFromEnv', () => {
	it('parses an integer value', () => {
		expect(intFromEnv('2500', 60000)).toBe(2500);
		expect(intFromEnv(' 0 ', 1)).toBe(0);
	});

	it('falls back when the value is unset or blank', () => {
		expect(intFromEnv(undefined, 60000)).toBe(60000);
		expect(intFromEnv('  ', 60000)).toBe(60000);
	});

	it('falls back when the value is not a number', () => {
		expect(intFromEnv('abc', 60000)).toBe(60000);
		expect(intFromEnv('NaN', 3)).toBe(3);
	});

	it('falls back when the value is below the minimum', () => {
		expect(intFromEnv('0', 4, 1)).toBe(4);
		expect(intFromEnv('-5', 1)).toBe(1);
	});
});
