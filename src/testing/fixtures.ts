import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { CampaignBrief, Product } from '../libs/types/pipeline.types';

export async function makeTempDir(prefix = 'creative-pipeline-'): Promise<string> {
	return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
	await fs.promises.rm(dir, { recursive: true, force: true });
}

export async function solidImage(
	width: number,
	height: number,
	background: { r: number; g: number; b: number } = { r: 40, g: 90, b: 160 },
	format: 'png' | 'jpeg' = 'png',
): Promise<Buffer> {
	const image = sharp({ create: { width, height, channels: 3, background } });
	return format === 'png' ? image.png().toBuffer() : image.jpeg({ quality: 90 }).toBuffer();
}

export async function writeSolidImage(
	filePath: string,
	width = 320,
	height = 240,
	background?: { r: number; g: number; b: number },
): Promise<string> {
	await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
	const format = /\.jpe?g$/i.test(filePath) ? 'jpeg' : 'png';
	await fs.promises.writeFile(filePath, await solidImage(width, height, background, format));
	return filePath;
}

export function buildProduct(overrides: Partial<Product> = {}): Product {
	return {
		id: 'trail-runner-shoe',
		name: 'Trail Runner Shoe',
		description: 'Lightweight shoe with aggressive grip',
		tags: ['running', 'outdoor'],
		...overrides,
	};
}

export function buildBrief(overrides: Partial<CampaignBrief> = {}): CampaignBrief {
	return {
		campaign_id: 'fall_launch_2025',
		campaign_name: 'Fall Launch 2025',
		brand_name: 'Northpeak',
		primary_color: '#F97316',
		secondary_color: '#FFFFFF',
		font: { family: 'DejaVu Sans, sans-serif' },
		messaging: {
			headline: 'Own the Trail',
			subheading: 'Grip that holds on every surface',
			call_to_action: 'Shop now',
		},
		locale: 'en-US',
		demographics: { age: '25-40', interests: ['running'] },
		products: [buildProduct()],
		...overrides,
	};
}
