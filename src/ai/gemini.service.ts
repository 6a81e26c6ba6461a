import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI, HarmBlockThreshold, HarmCategory, Part } from '@google/genai';
import { ImageGenerationError, ImageGenerationTimeoutError, errorMessage } from '../common/errors/pipeline.errors';
import { GeneratedImageResult } from '../libs/config';
import { AIMessage } from '../libs/messages';

const REFUSAL_MARKERS = ['cannot generate', 'unable to generate', 'i cannot', 'i am unable', 'violates', 'policy'];

@Injectable()
export class GeminiService {
	private client: GoogleGenAI | null = null;
	private readonly logger = new Logger(GeminiService.name);

	constructor(private readonly configService: ConfigService) { }

	private get model(): string {
		return this.configService.get<string>('gemini.model') || 'gemini-2.5-flash-image';
	}

	private get timeoutMs(): number {
		return this.configService.get<number>('generator.timeoutMs') ?? 60000;
	}

	private get maxRetries(): number {
		return this.configService.get<number>('generator.maxRetries') ?? 1;
	}

	private get retryDelayMs(): number {
		return this.configService.get<number>('generator.retryDelayMs') ?? 3000;
	}

	isConfigured(): boolean {
		return !!this.configService.get<string>('gemini.apiKey');
	}

	getModelName(): string {
		return this.model;
	}

	/**
	 * Promise with timeout wrapper
	 */
	private withTimeout<T>(promise: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
		return new Promise((resolve, reject) => {
			const timeoutId = setTimeout(() => {
				reject(new ImageGenerationTimeoutError(`⏱️ ${operationName} timed out after ${timeoutMs / 1000} seconds`));
			}, timeoutMs);

			promise
				.then((result) => {
					clearTimeout(timeoutId);
					resolve(result);
				})
				.catch((error: unknown) => {
					clearTimeout(timeoutId);
					reject(error);
				});
		});
	}

	/**
	 * Single Gemini call. Throws ImageGenerationError when the model refuses
	 * or answers without an image part.
	 */
	async generateOnce(prompt: string): Promise<GeneratedImageResult> {
		if (!prompt || !prompt.trim()) {
			throw new ImageGenerationError('Prompt string is required');
		}

		const client = this.getClient();
		const startTime = Date.now();

		this.logger.log(`🎨 [Gemini] Generating image | model=${this.model} timeout=${this.timeoutMs / 1000}s`);
		this.logger.debug(`📝 Prompt (first 200 chars): ${prompt.substring(0, 200)}...`);

		const response = await this.withTimeout(
			client.models.generateContent({
				model: this.model,
				contents: prompt.trim(),
				config: {
					responseModalities: ['TEXT', 'IMAGE'],
					safetySettings: [
						{ category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
						{ category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
						{ category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
						{ category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
					],
				},
			}),
			this.timeoutMs,
			'Gemini image generation',
		);

		const elapsedTime = ((Date.now() - startTime) / 1000).toFixed(2);
		const candidate = response.candidates?.[0];
		if (!candidate) {
			throw new ImageGenerationError('Gemini returned no candidates');
		}

		const parts: Part[] = candidate.content?.parts ?? [];
		if (parts.length === 0) {
			const finishReason = String(candidate.finishReason ?? '');
			if (finishReason === 'IMAGE_SAFETY' || finishReason === 'SAFETY') {
				throw new ImageGenerationError('Image generation was blocked by platform safety policy');
			}
			throw new ImageGenerationError('Gemini returned no parts');
		}

		let textResponse = '';
		for (const part of parts) {
			if (part.text && !part.thought) {
				textResponse = part.text;
				const lowerText = part.text.toLowerCase();
				if (REFUSAL_MARKERS.some((marker) => lowerText.includes(marker))) {
					throw new ImageGenerationError(`Model refused: ${part.text.substring(0, 300)}`);
				}
			}

			const data = part.inlineData?.data;
			if (data && data.length > 0) {
				this.logger.log(`✅ [Gemini] Image generated in ${elapsedTime}s (${(data.length / 1024).toFixed(1)} KB base64)`);
				return { data };
			}
		}

		throw new ImageGenerationError(
			textResponse
				? `Gemini did not generate any images. Model response: ${textResponse.substring(0, 300)}`
				: 'Gemini did not generate any images and provided no explanation.',
		);
	}

	/**
	 * 🚀 Main entry point, with retries.
	 * Quota exhaustion, timeouts and policy refusals are not retried.
	 */
	async generateImage(prompt: string): Promise<GeneratedImageResult> {
		const attempts = Math.max(0, this.maxRetries) + 1;
		const startTime = Date.now();

		for (let attempt = 0; attempt < attempts; attempt++) {
			try {
				if (attempt > 0) {
					this.logger.log(`🔄 Retry attempt ${attempt + 1}/${attempts}...`);
					await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
				}
				return await this.generateOnce(prompt);
			} catch (error) {
				const message = errorMessage(error);
				const elapsedTime = ((Date.now() - startTime) / 1000).toFixed(2);

				if (message.includes('429') || message.includes('RESOURCE_EXHAUSTED') || message.toLowerCase().includes('quota')) {
					this.logger.error(`❌ Gemini API quota exhausted — not retrying`);
					throw new ImageGenerationError(`${AIMessage.QUOTA_EXHAUSTED}: ${message.substring(0, 200)}`);
				}
				if (error instanceof ImageGenerationTimeoutError) {
					this.logger.error(`⏱️ Timeout error - not retrying`);
					throw error;
				}
				if (/violates|policy|refused/i.test(message)) {
					this.logger.error(`🚫 Policy violation - not retrying`);
					throw error;
				}
				if (attempt === attempts - 1) {
					this.logger.error(`❌ All ${attempts} attempts failed after ${elapsedTime}s`);
					throw error instanceof ImageGenerationError ? error : new ImageGenerationError(`Gemini error: ${message.substring(0, 200)}`);
				}

				this.logger.warn(`⚠️ Attempt ${attempt + 1} failed after ${elapsedTime}s: ${message}`);
			}
		}

		throw new ImageGenerationError(AIMessage.IMAGE_GENERATION_FAILED);
	}

	private getClient(): GoogleGenAI {
		if (this.client) {
			return this.client;
		}

		const apiKey = this.configService.get<string>('gemini.apiKey');
		if (!apiKey) {
			this.logger.error('❌ GEMINI_API_KEY is missing in environment variables');
			throw new ImageGenerationError(AIMessage.GEMINI_API_KEY_MISSING);
		}

		this.logger.log(`🔑 Using Gemini API key ${apiKey.substring(0, 4)}... (model ${this.model})`);
		this.client = new GoogleGenAI({ apiKey });
		return this.client;
	}
}
