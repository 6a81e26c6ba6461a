import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors/pipeline.errors';
import { MessagingSource } from '../libs/enums';
import { AdaptedMessaging, CampaignBrief, CampaignMessaging, Product } from '../libs/types/pipeline.types';
import { MESSAGING_ADAPTER, MessagingAdapter } from './messaging-adapter.interface';
import { MessagingCache } from './messaging-cache';

/**
 * Messaging Adapter
 *
 * Produces per-product, per-locale copy. Without a configured backend, or
 * when the backend fails, the brief's messaging is returned unchanged.
 */
@Injectable()
export class MessagingService {
	private readonly logger = new Logger(MessagingService.name);

	constructor(
		@Inject(MESSAGING_ADAPTER)
		private readonly adapter: MessagingAdapter | null,
	) { }

	createCache(): MessagingCache {
		return new MessagingCache();
	}

	/**
	 * Memoized by (product id, locale) within the given cache.
	 */
	adapt(brief: CampaignBrief, product: Product, locale: string, cache: MessagingCache): Promise<AdaptedMessaging> {
		return cache.getOrCreate(product.id, locale, () => this.adaptUncached(brief, product, locale));
	}

	private async adaptUncached(brief: CampaignBrief, product: Product, locale: string): Promise<AdaptedMessaging> {
		if (!this.adapter) {
			return this.fromBrief(brief.messaging, product.id, locale);
		}

		try {
			const adapted = await this.adapter.adapt({ brief, product, locale });
			const merged = this.merge(brief.messaging, adapted);
			this.logger.log(`✍️ [${product.id}] Copy adapted by ${this.adapter.name}: "${merged.headline}"`);
			return Object.freeze({ ...merged, product_id: product.id, locale, source: MessagingSource.ADAPTED });
		} catch (error) {
			this.logger.warn(`⚠️ [${product.id}] ${this.adapter.name} adaptation failed (${errorMessage(error)}) — using brief messaging`);
			return this.fromBrief(brief.messaging, product.id, locale);
		}
	}

	/** Field-by-field: blank or missing adapted fields keep the brief's value */
	private merge(original: CampaignMessaging, adapted: Partial<CampaignMessaging>): CampaignMessaging {
		const subheading = adapted.subheading?.trim() || original.subheading;
		const callToAction = adapted.call_to_action?.trim() || original.call_to_action;
		return {
			headline: adapted.headline?.trim() || original.headline,
			...(subheading ? { subheading } : {}),
			...(callToAction ? { call_to_action: callToAction } : {}),
		};
	}

	private fromBrief(messaging: CampaignMessaging, productId: string, locale: string): AdaptedMessaging {
		return Object.freeze({ ...messaging, product_id: productId, locale, source: MessagingSource.BRIEF });
	}
}
