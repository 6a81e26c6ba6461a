import sharp from 'sharp';
import { MockImageGenerator } from './mock-image.generator';

describe('MockImageGenerator', () => {
	const generator = new MockImageGenerator();

	it('is a local generator', () => {
		expect(generator.remote).toBe(false);
		expect(generator.name).toBe('mock');
	});

	it('renders a 1024px square PNG', async () => {
		const buffer = await generator.generate({ prompt: '', productId: 'trail-runner-shoe' });
		const metadata = await sharp(buffer).metadata();

		expect(metadata.format).toBe('png');
		expect(metadata.width).toBe(1024);
		expect(metadata.height).toBe(1024);
	});

	it('is deterministic per product id and ignores the prompt', async () => {
		const first = await generator.generate({ prompt: 'one', productId: 'trail-runner-shoe' });
		const second = await generator.generate({ prompt: 'two', productId: 'trail-runner-shoe' });

		expect(second.equals(first)).toBe(true);
	});

	it('differs between products', () => {
		expect(generator.buildSvg('trail-runner-shoe', 1024)).not.toBe(generator.buildSvg('city-sneaker', 1024));
	});
});
