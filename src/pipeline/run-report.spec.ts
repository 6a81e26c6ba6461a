import { AssetOrigin, OutcomeStatus, RunStatus } from '../libs/enums';
import { FailedOutcome, SucceededOutcome } from '../libs/types/pipeline.types';
import { RunReport } from './run-report';

const ok = (productIndex: number, aspectIndex: number, productId = `p${productIndex}`): SucceededOutcome => ({
	product_id: productId,
	aspect: (['1x1', '9x16', '16x9'] as const)[aspectIndex],
	product_index: productIndex,
	aspect_index: aspectIndex,
	asset_origin: AssetOrigin.MOCK,
	status: OutcomeStatus.SUCCEEDED,
	path: `/out/${productId}/${aspectIndex}.png`,
});

const failed = (productIndex: number, aspectIndex: number, reason: string): FailedOutcome => ({
	product_id: `p${productIndex}`,
	aspect: (['1x1', '9x16', '16x9'] as const)[aspectIndex],
	product_index: productIndex,
	aspect_index: aspectIndex,
	status: OutcomeStatus.FAILED,
	reason,
});

describe('RunReport', () => {
	it('has a uuid run id and the campaign id', () => {
		const report = new RunReport('fall_launch_2025');

		expect(report.run_id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
		expect(report.campaign_id).toBe('fall_launch_2025');
		expect(report.finished_at).toBeNull();
	});

	it('orders outcomes by product then aspect regardless of record order', () => {
		const report = new RunReport('c');
		report.record(ok(1, 2));
		report.record(ok(0, 1));
		report.record(ok(1, 0));
		report.record(ok(0, 0));

		expect(report.outcomes.map((o) => [o.product_index, o.aspect_index])).toEqual([
			[0, 0],
			[0, 1],
			[1, 0],
			[1, 2],
		]);
	});

	it('reports success when every pair succeeded', () => {
		const report = new RunReport('c');
		report.record(ok(0, 0));
		report.record(ok(0, 1));

		expect(report.status).toBe(RunStatus.SUCCESS);
		expect(report.failed).toEqual([]);
	});

	it('reports partial success with itemized failures', () => {
		const report = new RunReport('fall_launch_2025');
		report.record(ok(0, 0));
		report.record(failed(0, 1, 'Source image could not be decoded'));
		report.record(ok(0, 2));

		expect(report.status).toBe(RunStatus.PARTIAL);
		expect(report.succeeded).toHaveLength(2);
		expect(report.summary()).toBe(
			[
				`Run ${report.run_id} (fall_launch_2025): partial, 2/3 creatives written`,
				'  FAILED p0/9x16: Source image could not be decoded',
			].join('\n'),
		);
	});

	it('reports failure when nothing succeeded', () => {
		const report = new RunReport('c');
		report.record(failed(0, 0, 'x'));

		expect(report.status).toBe(RunStatus.FAILED);
	});

	it('rejects outcomes after finishing', () => {
		const report = new RunReport('c').finish();

		expect(report.finished_at).toBeInstanceOf(Date);
		expect(() => report.record(ok(0, 0))).toThrow('is finished');
	});

	it('serializes to JSON', () => {
		const report = new RunReport('c');
		report.record(ok(0, 0));
		report.finish();

		const json = JSON.parse(JSON.stringify(report));

		expect(json).toEqual({
			run_id: report.run_id,
			campaign_id: 'c',
			status: 'success',
			started_at: report.started_at.toISOString(),
			finished_at: report.finished_at?.toISOString(),
			outcomes: [ok(0, 0)],
		});
	});
});
