import { registerAs } from '@nestjs/config';
import { intFromEnv } from '../common/utils/env.util';

export default registerAs('claude', () => ({
	apiKey: process.env.CLAUDE_API_KEY,
	model: process.env.CLAUDE_MODEL || 'claude-sonnet-4-20250514',
	timeoutMs: intFromEnv(process.env.CLAUDE_TIMEOUT_MS, 30000, 1),
	maxRetries: intFromEnv(process.env.CLAUDE_MAX_RETRIES, 1),
}));
