/**
 * Pipeline Types
 *
 * Values passed between the resolver, producer, messaging adapter,
 * composer and orchestrator during one run.
 */

import { AssetOrigin, MessagingSource, OutcomeStatus } from '../enums';

// ═══════════════════════════════════════════════════════════
// Brief
// ═══════════════════════════════════════════════════════════

export interface CampaignMessaging {
	headline: string;
	subheading?: string;
	call_to_action?: string;
}

export interface FontReference {
	family: string;
	/** Absolute path to a font file; drawn through Pango when set */
	path?: string;
}

export interface Product {
	id: string;
	name: string;
	description: string;
	tags: string[];
	asset_path?: string;
}

export interface CampaignBrief {
	campaign_id: string;
	campaign_name: string;
	brand_name: string;
	primary_color: string;
	secondary_color: string;
	font: FontReference;
	messaging: CampaignMessaging;
	locale: string;
	demographics: Record<string, unknown>;
	products: Product[];
}

// ═══════════════════════════════════════════════════════════
// Component results
// ═══════════════════════════════════════════════════════════

export interface ResolvedAsset {
	product_id: string;
	path: string;
	origin: AssetOrigin;
}

export interface AdaptedMessaging extends CampaignMessaging {
	product_id: string;
	locale: string;
	source: MessagingSource;
}

export type AspectName = '1x1' | '9x16' | '16x9';

export interface AspectSpec {
	name: AspectName;
	ratio: string;
	widthRatio: number;
	heightRatio: number;
}

export interface CreativeArtifact {
	product_id: string;
	aspect: AspectName;
	path: string;
	width: number;
	height: number;
	bytes: number;
}

// ═══════════════════════════════════════════════════════════
// Run report
// ═══════════════════════════════════════════════════════════

interface OutcomeBase {
	product_id: string;
	aspect: AspectName;
	/** Position in the brief's product list, used for report ordering */
	product_index: number;
	aspect_index: number;
	asset_origin?: AssetOrigin;
}

export interface SucceededOutcome extends OutcomeBase {
	status: OutcomeStatus.SUCCEEDED;
	path: string;
}

export interface FailedOutcome extends OutcomeBase {
	status: OutcomeStatus.FAILED;
	reason: string;
}

export type ItemOutcome = SucceededOutcome | FailedOutcome;

export interface PipelineRunOptions {
	assetRoot: string;
	outputRoot: string;
	generatedRoot?: string;
	concurrency?: number;
}
