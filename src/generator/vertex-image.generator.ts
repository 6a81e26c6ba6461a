import { Injectable } from '@nestjs/common';
import { VertexImagenService } from '../ai/vertex-imagen.service';
import { ImageGenerationRequest, ImageGenerator } from './image-generator.interface';

@Injectable()
export class VertexImageGenerator implements ImageGenerator {
	readonly name = 'vertex';
	readonly remote = true;

	constructor(private readonly vertexImagenService: VertexImagenService) {}

	async generate(request: ImageGenerationRequest): Promise<Buffer> {
		// Square source; the composer crops per aspect ratio
		const image = await this.vertexImagenService.generateImage(request.prompt);
		return Buffer.from(image.data, 'base64');
	}
}
