import { Injectable } from '@nestjs/common';
import { PromptBuilder } from '../common/utils/prompt-builder.util';
import { CampaignBrief, CampaignMessaging, Product } from '../libs/types/pipeline.types';
import { DEFAULT_DEMOGRAPHIC, PRODUCT_IMAGE_PROMPT } from './prompts/product-image.prompt';
import { MESSAGING_ADAPTATION_PROMPT } from './prompts/messaging-adaptation.prompt';

@Injectable()
export class PromptBuilderService {
	// ═══════════════════════════════════════════════════════════
	// IMAGE GENERATION
	// ═══════════════════════════════════════════════════════════

	buildProductImagePrompt(brief: CampaignBrief, product: Product): string {
		return PromptBuilder.build(PRODUCT_IMAGE_PROMPT, {
			brand_name: brief.brand_name,
			product_name: product.name,
			product_description: product.description || product.name,
			demographics: this.formatDemographics(brief.demographics, '; ') || DEFAULT_DEMOGRAPHIC,
			keywords: product.tags.length > 0 ? `Keywords and visual cues: ${product.tags.join(', ')}.` : '',
		}).replace(/\n{2,}/g, '\n');
	}

	// ═══════════════════════════════════════════════════════════
	// MESSAGING ADAPTATION
	// ═══════════════════════════════════════════════════════════

	buildMessagingPrompt(brief: CampaignBrief, product: Product, locale: string): string {
		return PromptBuilder.build(MESSAGING_ADAPTATION_PROMPT, {
			brand_name: brief.brand_name,
			campaign_name: brief.campaign_name,
			locale,
			demographics: this.formatDemographics(brief.demographics, ', ') || 'unspecified',
			product_name: product.name,
			product_description: product.description || 'N/A',
			product_tags: product.tags.length > 0 ? product.tags : 'none',
			original_copy: this.formatOriginalCopy(brief.messaging),
		});
	}

	private formatOriginalCopy(messaging: CampaignMessaging): string {
		const lines = [`- headline: "${messaging.headline}"`];
		if (messaging.subheading) lines.push(`- subheading: "${messaging.subheading}"`);
		if (messaging.call_to_action) lines.push(`- call_to_action: "${messaging.call_to_action}"`);
		return lines.join('\n');
	}

	private formatDemographics(demographics: Record<string, unknown>, separator: string): string {
		return Object.entries(demographics)
			.map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
			.join(separator);
	}
}
