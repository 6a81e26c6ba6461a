import * as fs from 'fs';
import { parse } from 'opentype.js';
import { CompositionError, errorMessage } from '../common/errors/pipeline.errors';
import { RenderMessage } from '../libs/messages';

/**
 * Family name stored in a TrueType/OpenType file's name table; this is
 * the name fontconfig registers the file under.
 */
export async function readFontFamily(fontPath: string): Promise<string> {
	let buffer: Buffer;
	try {
		buffer = await fs.promises.readFile(fontPath);
	} catch {
		throw new CompositionError(`${RenderMessage.FONT_UNREADABLE}: ${fontPath}`);
	}

	let family: string | undefined;
	try {
		const font = parse(buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength));
		const names: Record<string, string> | undefined = font.names.fontFamily;
		family = names?.en ?? Object.values(names ?? {})[0];
	} catch (error) {
		throw new CompositionError(`${RenderMessage.FONT_INVALID}: ${fontPath} (${errorMessage(error)})`);
	}

	if (!family || !family.trim()) {
		throw new CompositionError(`${RenderMessage.FONT_INVALID}: ${fontPath} (no family name)`);
	}
	return family.trim();
}
