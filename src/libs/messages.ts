/**
 * Centralized Messages for the Creative Pipeline
 *
 * All error and log-facing messages are defined here to keep
 * wording consistent between components and the run report.
 */

// ═══════════════════════════════════════════════════════════
// BRIEF MESSAGES
// ═══════════════════════════════════════════════════════════

export enum BriefMessage {
    BRIEF_NOT_FOUND = 'Campaign brief file not found',
    BRIEF_UNREADABLE = 'Campaign brief file could not be read',
    BRIEF_INVALID_JSON = 'Campaign brief is not valid JSON',
    BRIEF_NOT_OBJECT = 'Campaign brief must be a JSON object',
    BRIEF_INVALID = 'Campaign brief failed validation',
    DUPLICATE_PRODUCT_ID = 'Product ids must be unique within a brief',
}

// ═══════════════════════════════════════════════════════════
// PIPELINE MESSAGES
// ═══════════════════════════════════════════════════════════

export enum PipelineMessage {
    OUTPUT_ROOT_UNAVAILABLE = 'Output root could not be created',
    ASSET_ROOT_NOT_DIRECTORY = 'Input asset path exists but is not a directory',
    PREPARATION_FAILED = 'Product preparation failed',
}

// ═══════════════════════════════════════════════════════════
// RENDER MESSAGES
// ═══════════════════════════════════════════════════════════

export enum RenderMessage {
    INVALID_COLOR = 'Invalid brand color',
    FONT_UNREADABLE = 'Font file could not be read',
    FONT_INVALID = 'Font file could not be parsed',
    SOURCE_UNREADABLE = 'Source image could not be decoded',
}

// ═══════════════════════════════════════════════════════════
// AI MESSAGES
// ═══════════════════════════════════════════════════════════

export enum AIMessage {
    GEMINI_API_KEY_MISSING = 'Gemini API key is not configured',
    VERTEX_PROJECT_MISSING = 'Vertex AI: VERTEX_PROJECT_ID is not set',
    CLAUDE_API_KEY_MISSING = 'Claude API key is not configured',
    IMAGE_GENERATION_FAILED = 'Image generation failed',
    QUOTA_EXHAUSTED = 'Image generation quota exhausted',
    MESSAGING_ADAPTATION_FAILED = 'AI failed to adapt campaign messaging',
    MESSAGING_INVALID_JSON = 'AI returned invalid JSON for campaign messaging',
}
