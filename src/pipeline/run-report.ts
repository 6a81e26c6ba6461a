import { v4 as uuidv4 } from 'uuid';
import { OutcomeStatus, RunStatus } from '../libs/enums';
import { FailedOutcome, ItemOutcome, SucceededOutcome } from '../libs/types/pipeline.types';

/**
 * Per-run record of every (product, aspect) outcome.
 *
 * Outcomes may be recorded in any order; readers always see them sorted
 * by brief product order, then aspect order. Read-only once finished.
 */
export class RunReport {
	readonly run_id: string = uuidv4();
	readonly started_at: Date = new Date();
	private finishedAt: Date | null = null;
	private readonly entries: ItemOutcome[] = [];

	constructor(readonly campaign_id: string) { }

	get finished_at(): Date | null {
		return this.finishedAt;
	}

	record(outcome: ItemOutcome): void {
		if (this.finishedAt) {
			throw new Error(`Run ${this.run_id} is finished; outcome for ${outcome.product_id}/${outcome.aspect} rejected`);
		}
		this.entries.push(Object.freeze({ ...outcome }));
	}

	finish(): this {
		if (!this.finishedAt) {
			this.finishedAt = new Date();
		}
		return this;
	}

	get outcomes(): readonly ItemOutcome[] {
		return [...this.entries].sort((a, b) => a.product_index - b.product_index || a.aspect_index - b.aspect_index);
	}

	get succeeded(): SucceededOutcome[] {
		return this.outcomes.filter((outcome): outcome is SucceededOutcome => outcome.status === OutcomeStatus.SUCCEEDED);
	}

	get failed(): FailedOutcome[] {
		return this.outcomes.filter((outcome): outcome is FailedOutcome => outcome.status === OutcomeStatus.FAILED);
	}

	get status(): RunStatus {
		const failed = this.failed.length;
		if (failed === 0) return RunStatus.SUCCESS;
		return failed === this.entries.length ? RunStatus.FAILED : RunStatus.PARTIAL;
	}

	/** Human-readable result; one line per failed pair */
	summary(): string {
		const lines = [
			`Run ${this.run_id} (${this.campaign_id}): ${this.status}, ${this.succeeded.length}/${this.entries.length} creatives written`,
		];
		for (const outcome of this.failed) {
			lines.push(`  FAILED ${outcome.product_id}/${outcome.aspect}: ${outcome.reason}`);
		}
		return lines.join('\n');
	}

	toJSON() {
		return {
			run_id: this.run_id,
			campaign_id: this.campaign_id,
			status: this.status,
			started_at: this.started_at.toISOString(),
			finished_at: this.finishedAt ? this.finishedAt.toISOString() : null,
			outcomes: this.outcomes,
		};
	}
}
