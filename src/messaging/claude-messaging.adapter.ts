import { Injectable, Logger } from '@nestjs/common';
import { ClaudeService } from '../ai/claude.service';
import { PromptBuilderService } from '../ai/prompt-builder.service';
import { MESSAGING_ADAPTATION_SYSTEM_PROMPT } from '../ai/prompts/messaging-adaptation.prompt';
import { MessagingAdaptationError } from '../common/errors/pipeline.errors';
import { AIMessage } from '../libs/messages';
import { CampaignMessaging } from '../libs/types/pipeline.types';
import { MessagingAdapter, MessagingAdaptationRequest } from './messaging-adapter.interface';

@Injectable()
export class ClaudeMessagingAdapter implements MessagingAdapter {
	readonly name = 'claude';
	private readonly logger = new Logger(ClaudeMessagingAdapter.name);

	constructor(
		private readonly claudeService: ClaudeService,
		private readonly promptBuilderService: PromptBuilderService,
	) { }

	async adapt(request: MessagingAdaptationRequest): Promise<Partial<CampaignMessaging>> {
		const userPrompt = this.promptBuilderService.buildMessagingPrompt(request.brief, request.product, request.locale);
		this.logger.log(`✍️ [${request.product.id}] Adapting copy for ${request.locale} (${userPrompt.length} chars prompt)`);

		const responseText = await this.claudeService.complete(MESSAGING_ADAPTATION_SYSTEM_PROMPT, userPrompt);
		return this.parseMessaging(responseText);
	}

	// ═══════════════════════════════════════════════════════════
	// JSON PARSING & VALIDATION
	// ═══════════════════════════════════════════════════════════

	parseMessaging(responseText: string): Partial<CampaignMessaging> {
		// Strip markdown code fences if Claude wrapped the JSON
		let cleaned = responseText.trim();
		if (cleaned.startsWith('```json')) {
			cleaned = cleaned.slice(7);
		} else if (cleaned.startsWith('```')) {
			cleaned = cleaned.slice(3);
		}
		if (cleaned.endsWith('```')) {
			cleaned = cleaned.slice(0, -3);
		}
		cleaned = cleaned.trim();

		let parsed: unknown;
		try {
			parsed = JSON.parse(cleaned);
		} catch {
			this.logger.error(`Failed to parse Claude response as JSON: ${cleaned.substring(0, 200)}...`);
			throw new MessagingAdaptationError(AIMessage.MESSAGING_INVALID_JSON);
		}
		if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
			throw new MessagingAdaptationError(AIMessage.MESSAGING_INVALID_JSON);
		}

		const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
		const result: Partial<CampaignMessaging> = {};
		const headline = text(record.headline);
		const subheading = text(record.subheading) ?? text(record.description);
		const callToAction = text(record.call_to_action) ?? text(record.cta);
		if (headline) result.headline = headline;
		if (subheading) result.subheading = subheading;
		if (callToAction) result.call_to_action = callToAction;

		if (Object.keys(result).length === 0) {
			throw new MessagingAdaptationError(AIMessage.MESSAGING_INVALID_JSON);
		}
		return result;
	}
}

function text(value: unknown): string | undefined {
	if (typeof value !== 'string') return undefined;
	const trimmed = value.trim();
	return trimmed || undefined;
}
