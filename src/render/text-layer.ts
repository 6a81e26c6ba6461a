import sharp from 'sharp';
import { CompositionError, errorMessage } from '../common/errors/pipeline.errors';
import { LINE_SPACING_EM, escapeXml } from './render.utils';

export interface TextStyle {
	size: number;
	color: string;
	bold: boolean;
	maxWidth: number;
}

/** A laid-out text block, RGBA PNG no wider than the requested width */
export interface TextBlock {
	width: number;
	height: number;
	image: Buffer;
}

/**
 * Pango text through sharp. Lines wrap at measured glyph widths; a font
 * file, when given, is registered with fontconfig and selected by the
 * family name read from it.
 */
export class TextRenderer {
	constructor(
		private readonly family: string,
		private readonly fontFile?: string,
	) { }

	async render(text: string, style: TextStyle): Promise<TextBlock | null> {
		const content = text.trim();
		if (!content) return null;

		// A font file is drawn in its own weight
		const weight = !this.fontFile && style.bold ? ' Bold' : '';

		try {
			const { data, info } = await sharp({
				text: {
					text: `<span foreground="${style.color}">${escapeXml(content)}</span>`,
					font: `${this.family}${weight} ${style.size}`,
					...(this.fontFile ? { fontfile: this.fontFile } : {}),
					width: style.maxWidth,
					dpi: 72,
					rgba: true,
					wrap: 'word-char',
					spacing: Math.round(style.size * LINE_SPACING_EM),
				},
			})
				.png()
				.toBuffer({ resolveWithObject: true });

			if (info.width <= style.maxWidth) {
				return { width: info.width, height: info.height, image: data };
			}

			// Glyph overhang past the layout width
			const image = await sharp(data)
				.extract({ left: 0, top: 0, width: style.maxWidth, height: info.height })
				.png()
				.toBuffer();
			return { width: style.maxWidth, height: info.height, image };
		} catch (error) {
			throw new CompositionError(`Text could not be rendered with "${this.family}": ${errorMessage(error)}`);
		}
	}
}
