import { registerAs } from '@nestjs/config';
import { intFromEnv } from '../common/utils/env.util';

export default registerAs('generator', () => ({
	// mock | gemini | vertex
	provider: (process.env.IMAGE_PROVIDER || 'mock').trim().toLowerCase(),
	timeoutMs: intFromEnv(process.env.GENERATOR_TIMEOUT_MS, 60000, 1),
	// Retries after the first attempt
	maxRetries: intFromEnv(process.env.GENERATOR_MAX_RETRIES, 1),
	retryDelayMs: intFromEnv(process.env.GENERATOR_RETRY_DELAY_MS, 3000),
}));
