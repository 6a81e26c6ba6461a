import * as fs from 'fs';
import * as path from 'path';
import { BriefValidationError } from '../common/errors/pipeline.errors';
import { BriefMessage } from '../libs/messages';
import { makeTempDir, removeDir } from '../testing/fixtures';
import { BriefLoaderService } from './brief-loader.service';

const minimalBrief = () => ({
	campaign_id: 'fall_launch_2025',
	campaign_name: 'Fall Launch',
	brand_name: 'Northpeak',
	products: [{ id: 'trail-runner-shoe', name: 'Trail Runner Shoe', tags: ['run', 'trail', 'run'] }],
});

describe('BriefLoaderService', () => {
	const loader = new BriefLoaderService();

	describe('parse', () => {
		it('fills defaults for optional fields', async () => {
			const brief = await loader.parse(minimalBrief(), '/briefs');

			expect(brief.primary_color).toBe('#111827');
			expect(brief.secondary_color).toBe('#F97316');
			expect(brief.locale).toBe('en-US');
			expect(brief.font).toEqual({ family: 'Roboto, Helvetica, Arial, sans-serif' });
			expect(brief.messaging).toEqual({ headline: 'Fall Launch' });
			expect(brief.demographics).toEqual({});
			expect(brief.products).toEqual([
				{ id: 'trail-runner-shoe', name: 'Trail Runner Shoe', description: '', tags: ['run', 'trail'] },
			]);
		});

		it('accepts description as the subheading', async () => {
			const brief = await loader.parse({
				...minimalBrief(),
				messaging: { headline: 'Own the Trail', description: 'Grip everywhere', call_to_action: 'Shop now' },
			});

			expect(brief.messaging).toEqual({ headline: 'Own the Trail', subheading: 'Grip everywhere', call_to_action: 'Shop now' });
		});

		it('resolves font_path against the base directory', async () => {
			const brief = await loader.parse({ ...minimalBrief(), font_path: 'fonts/Brand-Bold.ttf' }, '/briefs');

			expect(brief.font.path).toBe(path.resolve('/briefs', 'fonts/Brand-Bold.ttf'));
		});

		it('returns a frozen brief', async () => {
			const brief = await loader.parse(minimalBrief());

			expect(Object.isFrozen(brief)).toBe(true);
			expect(Object.isFrozen(brief.products[0])).toBe(true);
			expect(Object.isFrozen(brief.products[0].tags)).toBe(true);
		});

		it('lists every violated constraint', async () => {
			const raw = { ...minimalBrief(), brand_name: undefined, products: [] };

			const error = await loader.parse(raw).catch((e: unknown) => e);

			expect(error).toBeInstanceOf(BriefValidationError);
			expect(error instanceof BriefValidationError && error.violations).toEqual(
				expect.arrayContaining(['brand_name: brand_name must be a string', 'products: products must contain at least 1 elements']),
			);
		});

		it('rejects ids that are not filesystem-safe', async () => {
			const raw = { ...minimalBrief(), products: [{ id: '../escape', name: 'Bad' }] };

			const error = await loader.parse(raw).catch((e: unknown) => e);

			expect(error instanceof BriefValidationError && error.violations).toEqual([
				'products.0.id: id must be a filesystem-safe identifier',
			]);
		});

		it('rejects duplicate product ids', async () => {
			const raw = {
				...minimalBrief(),
				products: [
					{ id: 'a', name: 'A' },
					{ id: 'a', name: 'A again' },
				],
			};

			await expect(loader.parse(raw)).rejects.toThrow(`${BriefMessage.DUPLICATE_PRODUCT_ID}: duplicate id "a"`);
		});

		it('rejects non-object input', async () => {
			await expect(loader.parse([minimalBrief()])).rejects.toThrow(BriefMessage.BRIEF_NOT_OBJECT);
		});
	});

	describe('load', () => {
		let dir: string;

		beforeEach(async () => {
			dir = await makeTempDir();
		});

		afterEach(async () => {
			await removeDir(dir);
		});

		it('reads a brief file and resolves font_path beside it', async () => {
			const briefPath = path.join(dir, 'campaign_brief.json');
			await fs.promises.writeFile(briefPath, JSON.stringify({ ...minimalBrief(), font_path: 'Brand.ttf' }));

			const brief = await loader.load(briefPath);

			expect(brief.campaign_id).toBe('fall_launch_2025');
			expect(brief.font.path).toBe(path.join(dir, 'Brand.ttf'));
		});

		it('reports a missing file', async () => {
			const briefPath = path.join(dir, 'missing.json');

			await expect(loader.load(briefPath)).rejects.toThrow(`${BriefMessage.BRIEF_NOT_FOUND}: ${briefPath}`);
		});

		it('reports invalid JSON', async () => {
			const briefPath = path.join(dir, 'broken.json');
			await fs.promises.writeFile(briefPath, '{ "campaign_id": ');

			await expect(loader.load(briefPath)).rejects.toThrow(BriefValidationError);
			await expect(loader.load(briefPath)).rejects.toThrow(BriefMessage.BRIEF_INVALID_JSON);
		});
	});
});
