import generatorConfig from './generator.config';

describe('generatorConfig', () => {
	const saved = { ...process.env };

	afterEach(() => {
		process.env = { ...saved };
	});

	it('uses the defaults when nothing is set', () => {
		delete process.env.IMAGE_PROVIDER;
		delete process.env.GENERATOR_TIMEOUT_MS;
		delete process.env.GENERATOR_MAX_RETRIES;
		delete process.env.GENERATOR_RETRY_DELAY_MS;

		expect(generatorConfig()).toEqual({ provider: 'mock', timeoutMs: 60000, maxRetries: 1, retryDelayMs: 3000 });
	});

	it('reads numeric settings from the environment', () => {
		process.env.IMAGE_PROVIDER = ' Gemini ';
		process.env.GENERATOR_TIMEOUT_MS = '15000';
		process.env.GENERATOR_MAX_RETRIES = '0';
		process.env.GENERATOR_RETRY_DELAY_MS = '250';

		expect(generatorConfig()).toEqual({ provider: 'gemini', timeoutMs: 15000, maxRetries: 0, retryDelayMs: 250 });
	});

	it('falls back to the defaults for malformed numbers', () => {
		process.env.GENERATOR_TIMEOUT_MS = 'abc';
		process.env.GENERATOR_MAX_RETRIES = 'many';
		process.env.GENERATOR_RETRY_DELAY_MS = '-1';

		expect(generatorConfig()).toMatchObject({ timeoutMs: 60000, maxRetries: 1, retryDelayMs: 3000 });
	});
});
