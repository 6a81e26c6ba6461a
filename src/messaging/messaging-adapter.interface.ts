import { CampaignBrief, CampaignMessaging, Product } from '../libs/types/pipeline.types';

export const MESSAGING_ADAPTER = Symbol('MESSAGING_ADAPTER');

export interface MessagingAdaptationRequest {
	brief: CampaignBrief;
	product: Product;
	locale: string;
}

/**
 * Language-adaptation capability. Fields left out of the result fall
 * back to the brief's copy; throwing falls back to all of it.
 */
export interface MessagingAdapter {
	readonly name: string;
	adapt(request: MessagingAdaptationRequest): Promise<Partial<CampaignMessaging>>;
}
