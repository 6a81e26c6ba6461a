import { Injectable, Logger } from '@nestjs/common';
import sharp, { OverlayOptions } from 'sharp';
import { CompositionError, errorMessage } from '../common/errors/pipeline.errors';
import { FilesService } from '../files/files.service';
import { RenderMessage } from '../libs/messages';
import {
	AspectSpec,
	CampaignBrief,
	CampaignMessaging,
	CreativeArtifact,
	ResolvedAsset,
} from '../libs/types/pipeline.types';
import { CanvasSize, computeLayout, outputSize, parseColor } from './render.utils';
import { readFontFamily } from './font-family';
import { TextBlock, TextRenderer } from './text-layer';

const PNG_OPTIONS = { compressionLevel: 9, adaptiveFiltering: false } as const;

interface PlacedBlock {
	block: TextBlock;
	left: number;
	top: number;
}

/**
 * Composer Service
 *
 * Crops a source image to one output shape and draws the campaign copy
 * over a bottom gradient: headline, optional subheading, optional CTA pill.
 * Output is a PNG written under the run's output root.
 */
@Injectable()
export class ComposerService {
	private readonly logger = new Logger(ComposerService.name);
	// font_path → family name read from the file
	private readonly fontFamilies = new Map<string, Promise<string>>();

	constructor(private readonly filesService: FilesService) { }

	async compose(
		asset: ResolvedAsset,
		aspect: AspectSpec,
		messaging: CampaignMessaging,
		brief: CampaignBrief,
		outputRoot: string,
	): Promise<CreativeArtifact> {
		const size = outputSize(aspect);
		const buffer = await this.render(asset.path, size, messaging, brief);
		const outputPath = this.filesService.artifactPath(outputRoot, brief.campaign_id, asset.product_id, aspect.name);
		await this.filesService.storeImage(outputPath, buffer);

		this.logger.log(`🖼️ [${asset.product_id}/${aspect.name}] ${size.width}x${size.height} → ${outputPath}`);
		return {
			product_id: asset.product_id,
			aspect: aspect.name,
			path: outputPath,
			width: size.width,
			height: size.height,
			bytes: buffer.length,
		};
	}

	/**
	 * Render one creative to PNG bytes without writing it.
	 */
	async render(sourcePath: string, size: CanvasSize, messaging: CampaignMessaging, brief: CampaignBrief): Promise<Buffer> {
		const primary = parseColor(brief.primary_color);
		const secondary = parseColor(brief.secondary_color);
		const textRenderer = await this.createTextRenderer(brief);
		const base = await this.cropSource(sourcePath, size);

		const layout = computeLayout(size);
		const placed: PlacedBlock[] = [];
		let cursorY = layout.top;

		const headline = await textRenderer.render(messaging.headline, {
			size: layout.headlineSize,
			color: primary,
			bold: true,
			maxWidth: layout.maxWidth,
		});
		if (headline) {
			placed.push({ block: headline, left: layout.marginX, top: cursorY });
			cursorY += headline.height + layout.headlineGap;
		}

		const subheading = messaging.subheading
			? await textRenderer.render(messaging.subheading, {
				size: layout.bodySize,
				color: secondary,
				bold: false,
				maxWidth: layout.maxWidth,
			})
			: null;
		if (subheading) {
			placed.push({ block: subheading, left: layout.marginX, top: cursorY });
			cursorY += subheading.height + layout.bodyGap;
		}

		let pill = '';
		const cta = messaging.call_to_action
			? await textRenderer.render(messaging.call_to_action, {
				size: layout.ctaSize,
				color: secondary,
				bold: true,
				maxWidth: layout.maxWidth - 2 * layout.pillPaddingX,
			})
			: null;
		if (cta) {
			const pillWidth = cta.width + 2 * layout.pillPaddingX;
			const pillHeight = cta.height + 2 * layout.pillPaddingY;
			pill = `<rect x="${layout.marginX}" y="${cursorY}" width="${pillWidth}" height="${pillHeight}" rx="${Math.round(pillHeight / 2)}" fill="${primary}"/>`;
			placed.push({ block: cta, left: layout.marginX + layout.pillPaddingX, top: cursorY + layout.pillPaddingY });
		}

		const overlay = [
			`<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}">`,
			'<defs><linearGradient id="shade" x1="0" y1="0" x2="0" y2="1">',
			'<stop offset="0" stop-color="#000000" stop-opacity="0"/>',
			'<stop offset="1" stop-color="#000000" stop-opacity="0.86"/>',
			'</linearGradient></defs>',
			`<rect x="0" y="${size.height - layout.gradientHeight}" width="${size.width}" height="${layout.gradientHeight}" fill="url(#shade)"/>`,
			pill,
			'</svg>',
		].join('');

		const layers: OverlayOptions[] = [{ input: Buffer.from(overlay), left: 0, top: 0 }];
		for (const { block, left, top } of placed) {
			const layer = await this.clipToCanvas(block.image, block.width, block.height, left, top, size);
			if (layer) layers.push(layer);
		}

		try {
			return await sharp(base).composite(layers).png(PNG_OPTIONS).toBuffer();
		} catch (error) {
			throw new CompositionError(`Overlay composition failed: ${errorMessage(error)}`);
		}
	}

	// ═══════════════════════════════════════════════════════════
	// HELPERS
	// ═══════════════════════════════════════════════════════════

	private async createTextRenderer(brief: CampaignBrief): Promise<TextRenderer> {
		const fontPath = brief.font.path;
		if (!fontPath) {
			return new TextRenderer(brief.font.family);
		}
		let family = this.fontFamilies.get(fontPath);
		if (!family) {
			family = readFontFamily(fontPath);
			this.fontFamilies.set(fontPath, family);
		}
		return new TextRenderer(await family, fontPath);
	}

	/** Auto-orient, drop alpha onto black, center-crop to the target shape */
	private async cropSource(sourcePath: string, size: CanvasSize): Promise<Buffer> {
		try {
			return await sharp(sourcePath)
				.rotate()
				.flatten({ background: '#000000' })
				.resize(size.width, size.height, { fit: 'cover', position: 'centre' })
				.png()
				.toBuffer();
		} catch (error) {
			throw new CompositionError(`${RenderMessage.SOURCE_UNREADABLE}: ${sourcePath} (${errorMessage(error)})`);
		}
	}

	/** sharp rejects overlays that extend past the base image */
	private async clipToCanvas(
		image: Buffer,
		width: number,
		height: number,
		left: number,
		top: number,
		canvas: CanvasSize,
	): Promise<OverlayOptions | null> {
		if (left >= canvas.width || top >= canvas.height) return null;

		const visibleWidth = Math.min(width, canvas.width - left);
		const visibleHeight = Math.min(height, canvas.height - top);
		if (visibleWidth === width && visibleHeight === height) {
			return { input: image, left, top };
		}

		const clipped = await sharp(image)
			.extract({ left: 0, top: 0, width: visibleWidth, height: visibleHeight })
			.png()
			.toBuffer();
		return { input: clipped, left, top };
	}
}
