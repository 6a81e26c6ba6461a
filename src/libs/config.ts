import { AspectSpec } from './types/pipeline.types';

// Image generation result type
export type GeneratedImageResult = {
	data: string; // base64 encoded image data
};

/** Output shapes, in render order. The long side is always OUTPUT_LONG_SIDE px. */
export const ASPECT_SPECS: readonly AspectSpec[] = [
	{ name: '1x1', ratio: '1:1', widthRatio: 1, heightRatio: 1 },
	{ name: '9x16', ratio: '9:16', widthRatio: 9, heightRatio: 16 },
	{ name: '16x9', ratio: '16:9', widthRatio: 16, heightRatio: 9 },
] as const;

export const OUTPUT_LONG_SIDE = 1200;

export const MOCK_IMAGE_SIZE = 1024;

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'] as const;

export const SAFE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const BRIEF_DEFAULTS = {
	primary_color: '#111827',
	secondary_color: '#F97316',
	locale: 'en-US',
	font_family: 'Roboto, Helvetica, Arial, sans-serif',
} as const;
