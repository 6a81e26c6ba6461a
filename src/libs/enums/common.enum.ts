// Where a product's source image came from
export enum AssetOrigin {
	REUSED = 'reused',
	GENERATED = 'generated',
	MOCK = 'mock',
}

// Whether copy came back from the adaptation backend or is the brief's own
export enum MessagingSource {
	ADAPTED = 'adapted',
	BRIEF = 'brief',
}

export enum ImageProvider {
	MOCK = 'mock',
	GEMINI = 'gemini',
	VERTEX = 'vertex',
}

export enum MessagingProvider {
	NONE = 'none',
	CLAUDE = 'claude',
}

// Per (product, aspect) outcome
export enum OutcomeStatus {
	SUCCEEDED = 'succeeded',
	FAILED = 'failed',
}

// Whole-run verdict
export enum RunStatus {
	SUCCESS = 'success',
	PARTIAL = 'partial',
	FAILED = 'failed',
}
