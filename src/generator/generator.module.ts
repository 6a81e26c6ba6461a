import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AiModule } from '../ai/ai.module';
import { GeminiService } from '../ai/gemini.service';
import { VertexImagenService } from '../ai/vertex-imagen.service';
import { FilesModule } from '../files/files.module';
import { ImageProvider } from '../libs/enums';
import { GeminiImageGenerator } from './gemini-image.generator';
import { IMAGE_GENERATOR, ImageGenerator } from './image-generator.interface';
import { ImageProducerService } from './image-producer.service';
import { MockImageGenerator } from './mock-image.generator';
import { VertexImageGenerator } from './vertex-image.generator';

const logger = new Logger('GeneratorModule');

/**
 * Picks the image generator once, at startup. A remote provider without
 * credentials degrades to the mock here rather than on every product.
 */
export function selectImageGenerator(
	provider: string | undefined,
	mock: MockImageGenerator,
	gemini: { generator: GeminiImageGenerator; service: GeminiService },
	vertex: { generator: VertexImageGenerator; service: VertexImagenService },
): ImageGenerator {
	switch (provider) {
		case ImageProvider.GEMINI:
			if (gemini.service.isConfigured()) return gemini.generator;
			logger.warn('⚠️ IMAGE_PROVIDER=gemini but GEMINI_API_KEY is not set — using mock generator');
			return mock;
		case ImageProvider.VERTEX:
			if (vertex.service.isConfigured()) return vertex.generator;
			logger.warn('⚠️ IMAGE_PROVIDER=vertex but VERTEX_PROJECT_ID is not set — using mock generator');
			return mock;
		case ImageProvider.MOCK:
		case undefined:
			return mock;
		default:
			logger.warn(`⚠️ Unknown IMAGE_PROVIDER "${provider}" — using mock generator`);
			return mock;
	}
}

@Module({
	imports: [ConfigModule, AiModule, FilesModule],
	providers: [
		MockImageGenerator,
		GeminiImageGenerator,
		VertexImageGenerator,
		{
			provide: IMAGE_GENERATOR,
			inject: [ConfigService, MockImageGenerator, GeminiImageGenerator, GeminiService, VertexImageGenerator, VertexImagenService],
			useFactory: (
				configService: ConfigService,
				mock: MockImageGenerator,
				geminiGenerator: GeminiImageGenerator,
				geminiService: GeminiService,
				vertexGenerator: VertexImageGenerator,
				vertexService: VertexImagenService,
			): ImageGenerator => {
				const generator = selectImageGenerator(
					configService.get<string>('generator.provider'),
					mock,
					{ generator: geminiGenerator, service: geminiService },
					{ generator: vertexGenerator, service: vertexService },
				);
				logger.log(`🖼️ Image generator: ${generator.name}`);
				return generator;
			},
		},
		ImageProducerService,
	],
	exports: [ImageProducerService],
})
export class GeneratorModule { }
