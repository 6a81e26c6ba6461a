export const IMAGE_GENERATOR = Symbol('IMAGE_GENERATOR');

export interface ImageGenerationRequest {
	prompt: string;
	/** Owning product; the mock derives its seed from it */
	productId: string;
}

/**
 * Image generation capability. Remote variants call a provider and may
 * throw; the local mock never touches the network.
 */
export interface ImageGenerator {
	readonly name: string;
	readonly remote: boolean;
	generate(request: ImageGenerationRequest): Promise<Buffer>;
}
