#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PipelineConfigError, errorMessage } from './common/errors/pipeline.errors';
import { RunStatus } from './libs/enums';
import { PipelineService } from './pipeline/pipeline.service';

const EXIT_OK = 0;
const EXIT_ITEM_FAILURES = 1;
const EXIT_FATAL = 2;

/**
 * Usage: creative-pipeline [brief.json]
 * Everything else comes from the environment (see .env.example).
 */
async function bootstrap(): Promise<number> {
	const logger = new Logger('Bootstrap');
	const app = await NestFactory.createApplicationContext(AppModule);

	try {
		const pipeline = app.get(PipelineService);
		const briefPath = process.argv[2];
		const report = await pipeline.run(briefPath ? { briefPath } : {});

		console.log(report.summary());
		return report.status === RunStatus.SUCCESS ? EXIT_OK : EXIT_ITEM_FAILURES;
	} catch (error) {
		if (error instanceof PipelineConfigError) {
			logger.error(`❌ ${error.message}`);
			return EXIT_FATAL;
		}
		logger.error(`❌ Pipeline crashed: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
		return EXIT_FATAL;
	} finally {
		await app.close();
	}
}

bootstrap()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		console.error(error);
		process.exitCode = EXIT_FATAL;
	});
