import { registerAs } from '@nestjs/config';

export default registerAs('messaging', () => ({
	// none | claude
	provider: (process.env.MESSAGING_PROVIDER || 'none').trim().toLowerCase(),
}));
