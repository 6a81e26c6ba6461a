import { AdaptedMessaging } from '../libs/types/pipeline.types';

/**
 * Run-scoped memo of adapted copy keyed by (product id, locale).
 * Stores the in-flight promise, so concurrent first callers share one
 * adaptation instead of racing.
 */
export class MessagingCache {
	private readonly entries = new Map<string, Promise<AdaptedMessaging>>();

	static key(productId: string, locale: string): string {
		return `${productId}::${locale}`;
	}

	getOrCreate(productId: string, locale: string, factory: () => Promise<AdaptedMessaging>): Promise<AdaptedMessaging> {
		const key = MessagingCache.key(productId, locale);
		let entry = this.entries.get(key);
		if (!entry) {
			entry = factory();
			this.entries.set(key, entry);
		}
		return entry;
	}

	get size(): number {
		return this.entries.size;
	}
}
