import { Injectable } from '@nestjs/common';
import { GeminiService } from '../ai/gemini.service';
import { ImageGenerationRequest, ImageGenerator } from './image-generator.interface';

@Injectable()
export class GeminiImageGenerator implements ImageGenerator {
	readonly name = 'gemini';
	readonly remote = true;

	constructor(private readonly geminiService: GeminiService) { }

	async generate(request: ImageGenerationRequest): Promise<Buffer> {
		const image = await this.geminiService.generateImage(request.prompt);
		return Buffer.from(image.data, 'base64');
	}
}
