import { CompositionError } from '../common/errors/pipeline.errors';
import { OUTPUT_LONG_SIDE } from '../libs/config';
import { RenderMessage } from '../libs/messages';
import { AspectSpec } from '../libs/types/pipeline.types';

export interface CanvasSize {
	width: number;
	height: number;
}

/** Text block geometry, all derived from the canvas size */
export interface OverlayLayout {
	marginX: number;
	top: number;
	maxWidth: number;
	headlineSize: number;
	bodySize: number;
	ctaSize: number;
	headlineGap: number;
	bodyGap: number;
	gradientHeight: number;
	pillPaddingX: number;
	pillPaddingY: number;
}

// Extra leading between wrapped lines
export const LINE_SPACING_EM = 0.2;

export function outputSize(aspect: AspectSpec): CanvasSize {
	if (aspect.widthRatio >= aspect.heightRatio) {
		return {
			width: OUTPUT_LONG_SIDE,
			height: Math.round((OUTPUT_LONG_SIDE * aspect.heightRatio) / aspect.widthRatio),
		};
	}
	return {
		width: Math.round((OUTPUT_LONG_SIDE * aspect.widthRatio) / aspect.heightRatio),
		height: OUTPUT_LONG_SIDE,
	};
}

export function computeLayout({ width, height }: CanvasSize): OverlayLayout {
	const landscape = width / height > 1.5;
	const base = Math.max(width, height) * (landscape ? 0.06 : 0.055);
	const marginX = Math.round(width * 0.07);
	const ctaSize = Math.round(base * 0.5);

	return {
		marginX,
		top: Math.round(height * (landscape ? 0.5 : 0.55)),
		maxWidth: width - 2 * marginX,
		headlineSize: Math.round(base * 1.1),
		bodySize: Math.round(base * 0.5),
		ctaSize,
		headlineGap: Math.round(height * 0.01),
		bodyGap: Math.round(height * 0.02),
		gradientHeight: Math.round(height * 0.45),
		pillPaddingX: Math.round(ctaSize * 0.55),
		pillPaddingY: Math.round(ctaSize * 0.25),
	};
}

/**
 * Accepts `#RGB`, `#RRGGBB` (the `#` is optional) and returns `#RRGGBB`.
 */
export function parseColor(value: string): string {
	const hex = value.trim().replace(/^#/, '');
	if (/^[0-9a-fA-F]{6}$/.test(hex)) {
		return `#${hex.toUpperCase()}`;
	}
	if (/^[0-9a-fA-F]{3}$/.test(hex)) {
		return `#${hex
			.split('')
			.map((c) => c + c)
			.join('')
			.toUpperCase()}`;
	}
	throw new CompositionError(`${RenderMessage.INVALID_COLOR}: "${value}"`);
}

export function escapeXml(text: string): string {
	return text
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&apos;');
}
