import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import { MessagingAdaptationError, errorMessage } from '../common/errors/pipeline.errors';
import { AIMessage } from '../libs/messages';

/**
 * Claude Service
 *
 * Text completions for copy adaptation. The client is created lazily and
 * cached; per-call timeout and retry count come from the `claude` config.
 */
@Injectable()
export class ClaudeService {
	private readonly logger = new Logger(ClaudeService.name);
	private anthropicClient: Anthropic | null = null;

	constructor(private readonly configService: ConfigService) { }

	isConfigured(): boolean {
		return !!this.configService.get<string>('claude.apiKey');
	}

	getModelName(): string {
		return this.configService.get<string>('claude.model') || 'claude-sonnet-4-20250514';
	}

	/**
	 * Send one system + user prompt and return the first text block.
	 */
	async complete(systemPrompt: string, userPrompt: string, maxTokens = 1024): Promise<string> {
		const client = this.getAnthropicClient();

		try {
			const message = await client.messages.create({
				model: this.getModelName(),
				max_tokens: maxTokens,
				system: systemPrompt,
				messages: [
					{
						role: 'user',
						content: userPrompt,
					},
				],
			});

			const textBlock = message.content.find((block) => block.type === 'text');
			if (!textBlock || textBlock.type !== 'text') {
				throw new MessagingAdaptationError('No text response from Claude');
			}

			this.logger.log(`Claude response received (${message.usage.input_tokens} in / ${message.usage.output_tokens} out tokens)`);
			return textBlock.text;
		} catch (error) {
			if (error instanceof MessagingAdaptationError) throw error;
			this.logger.error(`Claude API call failed: ${errorMessage(error)}`);
			throw new MessagingAdaptationError(`${AIMessage.MESSAGING_ADAPTATION_FAILED}: ${errorMessage(error)}`);
		}
	}

	// ═══════════════════════════════════════════════════════════
	// ANTHROPIC CLIENT (lazy init, cached)
	// ═══════════════════════════════════════════════════════════

	private getAnthropicClient(): Anthropic {
		if (this.anthropicClient) return this.anthropicClient;

		const apiKey = this.configService.get<string>('claude.apiKey');
		if (!apiKey) {
			throw new MessagingAdaptationError(AIMessage.CLAUDE_API_KEY_MISSING);
		}

		this.anthropicClient = new Anthropic({
			apiKey,
			timeout: this.configService.get<number>('claude.timeoutMs') ?? 30000,
			maxRetries: this.configService.get<number>('claude.maxRetries') ?? 1,
		});
		this.logger.log('Anthropic client initialized for messaging adaptation');

		return this.anthropicClient;
	}
}
