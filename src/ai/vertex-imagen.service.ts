import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleAuth } from 'google-auth-library';
import { ImageGenerationError, ImageGenerationTimeoutError, errorMessage } from '../common/errors/pipeline.errors';
import { GeneratedImageResult } from '../libs/config';
import { AIMessage } from '../libs/messages';

interface ImagenPrediction {
	bytesBase64Encoded?: string;
	raiFilteredReason?: string;
}

interface ImagenPredictResponse {
	predictions?: ImagenPrediction[];
	raiFilteredReason?: string;
}

@Injectable()
export class VertexImagenService {
	private readonly logger = new Logger(VertexImagenService.name);
	private auth: GoogleAuth | null = null;

	constructor(private readonly configService: ConfigService) {}

	private getProjectId(): string {
		const id = this.configService.get<string>('vertex.projectId');
		if (!id) {
			this.logger.error('VERTEX_PROJECT_ID is missing');
			throw new ImageGenerationError(AIMessage.VERTEX_PROJECT_MISSING);
		}
		return id;
	}

	private getLocation(): string {
		return this.configService.get<string>('vertex.location') || 'us-central1';
	}

	private getModel(): string {
		return this.configService.get<string>('vertex.imagenModel') || 'imagen-3.0-generate-002';
	}

	private get timeoutMs(): number {
		return this.configService.get<number>('generator.timeoutMs') ?? 60000;
	}

	private async getAccessToken(): Promise<string> {
		try {
			if (!this.auth) {
				this.auth = new GoogleAuth({ scopes: ['https://www.googleapis.com/auth/cloud-platform'] });
			}
			const client = await this.auth.getClient();
			const { token } = await client.getAccessToken();
			if (!token) {
				throw new ImageGenerationError('Vertex AI: No access token. Set GOOGLE_APPLICATION_CREDENTIALS or run: gcloud auth application-default login');
			}
			return token;
		} catch (e) {
			if (e instanceof ImageGenerationError) throw e;
			this.logger.error(`Vertex AI auth failed: ${errorMessage(e)}`);
			throw new ImageGenerationError(`Vertex AI auth failed: ${errorMessage(e)}`);
		}
	}

	/**
	 * Generate one square image via the Vertex AI Imagen predict API.
	 * Same result shape as GeminiService.generateImage.
	 */
	async generateImage(prompt: string): Promise<GeneratedImageResult> {
		if (!prompt || !prompt.trim()) {
			throw new ImageGenerationError('Prompt is required');
		}

		const projectId = this.getProjectId();
		const location = this.getLocation();
		const model = this.getModel();

		const url = `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${location}/publishers/google/models/${model}:predict`;
		const body = {
			instances: [{ prompt: prompt.trim() }],
			parameters: {
				sampleCount: 1,
				aspectRatio: '1:1',
				personGeneration: 'allow_adult',
				safetySetting: 'block_medium_and_above',
				includeRaiReason: true,
			},
		};

		this.logger.log(`🎨 [Vertex Imagen] Generating image | project=${projectId} location=${location} model=${model}`);

		const token = await this.getAccessToken();
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

		try {
			const res = await fetch(url, {
				method: 'POST',
				headers: {
					Authorization: `Bearer ${token}`,
					'Content-Type': 'application/json',
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			});

			if (!res.ok) {
				const errText = await res.text();
				this.logger.error(`Vertex Imagen API error ${res.status}: ${errText.substring(0, 400)}`);
				throw new ImageGenerationError(`Vertex AI error ${res.status}: ${this.extractErrorMessage(errText)}`);
			}

			const data = (await res.json()) as ImagenPredictResponse;
			const first = data.predictions?.[0];
			if (!first?.bytesBase64Encoded) {
				const rai = first?.raiFilteredReason || data.raiFilteredReason;
				if (rai) {
					this.logger.warn(`Vertex Imagen RAI filter: ${rai}`);
					throw new ImageGenerationError(`Image filtered by safety: ${rai}`);
				}
				throw new ImageGenerationError('Vertex AI returned no image');
			}

			this.logger.log('✅ [Vertex Imagen] Image generated successfully');
			return { data: first.bytesBase64Encoded };
		} catch (e) {
			if (e instanceof Error && e.name === 'AbortError') {
				throw new ImageGenerationTimeoutError(`Vertex Imagen request timed out after ${this.timeoutMs / 1000}s`);
			}
			if (e instanceof ImageGenerationError) throw e;
			throw new ImageGenerationError(`Vertex Imagen error: ${errorMessage(e)}`);
		} finally {
			clearTimeout(timeoutId);
		}
	}

	private extractErrorMessage(errText: string): string {
		try {
			const errJson = JSON.parse(errText) as { error?: { message?: unknown }; message?: unknown };
			const msg = errJson.error?.message ?? errJson.message ?? errText;
			return typeof msg === 'string' ? msg : JSON.stringify(msg);
		} catch {
			return errText.substring(0, 400);
		}
	}

	getModelName(): string {
		return this.getModel();
	}

	isConfigured(): boolean {
		return !!this.configService.get<string>('vertex.projectId');
	}
}
