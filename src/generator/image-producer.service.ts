import { Inject, Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import { PromptBuilderService } from '../ai/prompt-builder.service';
import { errorMessage } from '../common/errors/pipeline.errors';
import { FilesService } from '../files/files.service';
import { AssetOrigin } from '../libs/enums';
import { CampaignBrief, Product, ResolvedAsset } from '../libs/types/pipeline.types';
import { IMAGE_GENERATOR, ImageGenerator } from './image-generator.interface';
import { MockImageGenerator } from './mock-image.generator';

/**
 * Image Producer
 *
 * Called after the resolver misses. Uses the configured generator; a remote
 * failure of any kind degrades to the local mock for that product and is
 * reported with the `mock` origin.
 */
@Injectable()
export class ImageProducerService {
	private readonly logger = new Logger(ImageProducerService.name);

	constructor(
		@Inject(IMAGE_GENERATOR)
		private readonly generator: ImageGenerator,
		private readonly mockGenerator: MockImageGenerator,
		private readonly promptBuilderService: PromptBuilderService,
		private readonly filesService: FilesService,
	) { }

	async produce(product: Product, brief: CampaignBrief, generatedRoot: string): Promise<ResolvedAsset> {
		if (this.generator.remote) {
			const generated = await this.produceRemote(product, brief, generatedRoot);
			if (generated) return generated;
		}
		return this.produceMock(product, generatedRoot);
	}

	private async produceRemote(product: Product, brief: CampaignBrief, generatedRoot: string): Promise<ResolvedAsset | null> {
		const cachedPath = this.filesService.generatedAssetPath(generatedRoot, product.id);
		if (await this.filesService.exists(cachedPath)) {
			this.logger.log(`📦 [${product.id}] Reusing cached ${this.generator.name} image ${cachedPath}`);
			return { product_id: product.id, path: cachedPath, origin: AssetOrigin.GENERATED };
		}

		const prompt = this.promptBuilderService.buildProductImagePrompt(brief, product);
		this.logger.log(`🎨 [${product.id}] Generating image with ${this.generator.name}`);

		try {
			const raw = await this.generator.generate({ prompt, productId: product.id });
			// Normalizes provider output (jpeg/webp) and rejects undecodable bytes
			const png = await sharp(raw).png().toBuffer();
			await this.filesService.storeImage(cachedPath, png);
			this.logger.log(`✅ [${product.id}] Generated image stored at ${cachedPath}`);
			return { product_id: product.id, path: cachedPath, origin: AssetOrigin.GENERATED };
		} catch (error) {
			this.logger.warn(`⚠️ [${product.id}] ${this.generator.name} generation failed (${errorMessage(error)}) — falling back to mock image`);
			return null;
		}
	}

	private async produceMock(product: Product, generatedRoot: string): Promise<ResolvedAsset> {
		const buffer = await this.mockGenerator.generate({ prompt: '', productId: product.id });
		const mockPath = this.filesService.mockAssetPath(generatedRoot, product.id);
		await this.filesService.storeImage(mockPath, buffer);
		return { product_id: product.id, path: mockPath, origin: AssetOrigin.MOCK };
	}
}
