import { Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import { createSeededRandom, seedFromString } from '../common/utils/seeded-random.util';
import { MOCK_IMAGE_SIZE } from '../libs/config';
import { ImageGenerationRequest, ImageGenerator } from './image-generator.interface';

/**
 * Local placeholder generator.
 *
 * Every color and shape position comes from a PRNG seeded with the
 * product id, so the same product always renders the same bytes.
 */
@Injectable()
export class MockImageGenerator implements ImageGenerator {
	readonly name = 'mock';
	readonly remote = false;
	private readonly logger = new Logger(MockImageGenerator.name);

	async generate(request: ImageGenerationRequest): Promise<Buffer> {
		const svg = this.buildSvg(request.productId, MOCK_IMAGE_SIZE);
		this.logger.log(`🧪 [${request.productId}] Rendering mock product image`);
		return sharp(Buffer.from(svg)).png({ compressionLevel: 9, adaptiveFiltering: false }).toBuffer();
	}

	buildSvg(productId: string, size: number): string {
		const random = createSeededRandom(seedFromString(productId));
		const baseHue = Math.floor(random() * 360);
		const accentHue = (baseHue + 150 + Math.floor(random() * 60)) % 360;

		const shapes: string[] = [];
		const shapeCount = 6 + Math.floor(random() * 5);
		for (let i = 0; i < shapeCount; i++) {
			const hue = (baseHue + Math.floor(random() * 90)) % 360;
			const fill = hslToHex(hue, 55 + random() * 30, 35 + random() * 30);
			const opacity = fmt(0.25 + random() * 0.45);
			const x = fmt(random() * size);
			const y = fmt(random() * size);
			if (random() < 0.5) {
				shapes.push(`<circle cx="${x}" cy="${y}" r="${fmt(size * (0.05 + random() * 0.2))}" fill="${fill}" fill-opacity="${opacity}"/>`);
			} else {
				const w = fmt(size * (0.1 + random() * 0.3));
				const h = fmt(size * (0.1 + random() * 0.3));
				const angle = fmt(random() * 90);
				shapes.push(`<rect x="${x}" y="${y}" width="${w}" height="${h}" fill="${fill}" fill-opacity="${opacity}" transform="rotate(${angle} ${x} ${y})"/>`);
			}
		}

		// Stand-in for the product: a centered card
		const card = size * 0.44;
		const cardOffset = fmt((size - card) / 2);

		return [
			`<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}">`,
			'<defs><linearGradient id="bg" x1="0" y1="0" x2="1" y2="1">',
			`<stop offset="0" stop-color="${hslToHex(baseHue, 45, 22)}"/>`,
			`<stop offset="1" stop-color="${hslToHex(baseHue, 40, 10)}"/>`,
			'</linearGradient></defs>',
			`<rect width="${size}" height="${size}" fill="url(#bg)"/>`,
			...shapes,
			`<rect x="${cardOffset}" y="${cardOffset}" width="${fmt(card)}" height="${fmt(card)}" rx="${fmt(card * 0.12)}" fill="${hslToHex(accentHue, 70, 55)}"/>`,
			`<circle cx="${size / 2}" cy="${size / 2}" r="${fmt(card * 0.22)}" fill="#FFFFFF" fill-opacity="0.85"/>`,
			'</svg>',
		].join('');
	}
}

function fmt(value: number): string {
	return value.toFixed(1);
}

function hslToHex(h: number, s: number, l: number): string {
	const sat = s / 100;
	const light = l / 100;
	const k = (n: number) => (n + h / 30) % 12;
	const a = sat * Math.min(light, 1 - light);
	const channel = (n: number) => {
		const value = light - a * Math.max(-1, Math.min(k(n) - 3, Math.min(9 - k(n), 1)));
		return Math.round(value * 255).toString(16).padStart(2, '0');
	};
	return `#${channel(0)}${channel(8)}${channel(4)}`.toUpperCase();
}
