import { registerAs } from '@nestjs/config';
import { intFromEnv } from '../common/utils/env.util';

export default registerAs('app', () => ({
	briefPath: process.env.BRIEF_PATH || 'briefs/campaign_brief.json',
	inputAssetsDir: process.env.INPUT_ASSETS_DIR || 'input-assets',
	outputRoot: process.env.OUTPUT_ROOT || 'outputs',
	// Remote generations are cached here per product id; mock placeholders go under ./mock
	generatedAssetsDir: process.env.GENERATED_ASSETS_DIR || 'generated-assets',
	concurrency: intFromEnv(process.env.PIPELINE_CONCURRENCY, 4, 1),
}));
