import { CompositionError } from '../common/errors/pipeline.errors';
import { ASPECT_SPECS } from '../libs/config';
import { computeLayout, escapeXml, outputSize, parseColor } from './render.utils';

describe('render utils', () => {
	describe('outputSize', () => {
		it('keeps the long side at 1200px', () => {
			expect(ASPECT_SPECS.map((aspect) => outputSize(aspect))).toEqual([
				{ width: 1200, height: 1200 },
				{ width: 675, height: 1200 },
				{ width: 1200, height: 675 },
			]);
		});
	});

	describe('computeLayout', () => {
		it('sizes text from the canvas for square output', () => {
			expect(computeLayout({ width: 1200, height: 1200 })).toEqual({
				marginX: 84,
				top: 660,
				maxWidth: 1032,
				headlineSize: 73,
				bodySize: 33,
				ctaSize: 33,
				headlineGap: 12,
				bodyGap: 24,
				gradientHeight: 540,
				pillPaddingX: 18,
				pillPaddingY: 8,
			});
		});

		it('uses a larger base and a higher block for wide output', () => {
			const layout = computeLayout({ width: 1200, height: 675 });

			expect(layout.headlineSize).toBe(79);
			expect(layout.bodySize).toBe(36);
			expect(layout.top).toBe(338);
		});

		it('narrows the block for tall output', () => {
			const layout = computeLayout({ width: 675, height: 1200 });

			expect(layout.marginX).toBe(47);
			expect(layout.maxWidth).toBe(581);
			expect(layout.headlineSize).toBe(73);
		});
	});

	describe('parseColor', () => {
		it.each([
			['#f97316', '#F97316'],
			['F97316', '#F97316'],
			['#fff', '#FFFFFF'],
			[' #111827 ', '#111827'],
		])('normalizes %s', (input, expected) => {
			expect(parseColor(input)).toBe(expected);
		});

		it.each(['orange', '#12', '#GGGGGG', ''])('rejects "%s"', (input) => {
			expect(() => parseColor(input)).toThrow(CompositionError);
		});

		it('names the offending value', () => {
			expect(() => parseColor('orange')).toThrow('Invalid brand color: "orange"');
		});
	});

	it('escapes XML special characters', () => {
		expect(escapeXml(`Tom & "Jerry's" <3>`)).toBe('Tom &amp; &quot;Jerry&apos;s&quot; &lt;3&gt;');
	});
});
