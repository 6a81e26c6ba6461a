import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import appConfig from './config/app.config';
import claudeConfig from './config/claude.config';
import geminiConfig from './config/gemini.config';
import generatorConfig from './config/generator.config';
import messagingConfig from './config/messaging.config';
import vertexConfig from './config/vertex.config';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			load: [appConfig, generatorConfig, geminiConfig, vertexConfig, messagingConfig, claudeConfig],
		}),
		PipelineModule,
	],
})
export class AppModule { }
