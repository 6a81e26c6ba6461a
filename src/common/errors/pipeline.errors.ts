// Raised before any item is attempted; aborts the run
export class PipelineConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'PipelineConfigError';
	}
}

export class BriefValidationError extends PipelineConfigError {
	constructor(
		message: string,
		readonly violations: string[] = [],
	) {
		super(violations.length > 0 ? `${message}: ${violations.join('; ')}` : message);
		this.name = 'BriefValidationError';
	}
}

// A single (product, aspect) composition could not be produced
export class CompositionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CompositionError';
	}
}

export class ImageGenerationTimeoutError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ImageGenerationTimeoutError';
	}
}

export class ImageGenerationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ImageGenerationError';
	}
}

export class MessagingAdaptationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'MessagingAdaptationError';
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
