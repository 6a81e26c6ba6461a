import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { from, lastValueFrom, mergeMap, toArray } from 'rxjs';
import { AssetResolverService } from '../assets/asset-resolver.service';
import { BriefLoaderService } from '../brief/brief-loader.service';
import { PipelineConfigError, errorMessage } from '../common/errors/pipeline.errors';
import { FilesService } from '../files/files.service';
import { ImageProducerService } from '../generator/image-producer.service';
import { ASPECT_SPECS } from '../libs/config';
import { AssetOrigin, OutcomeStatus } from '../libs/enums';
import { PipelineMessage } from '../libs/messages';
import {
	AdaptedMessaging,
	AspectSpec,
	CampaignBrief,
	ItemOutcome,
	PipelineRunOptions,
	Product,
	ResolvedAsset,
} from '../libs/types/pipeline.types';
import { MessagingCache } from '../messaging/messaging-cache';
import { MessagingService } from '../messaging/messaging.service';
import { ComposerService } from '../render/composer.service';
import { RunReport } from './run-report';

export interface RunOptions extends Partial<PipelineRunOptions> {
	briefPath?: string;
}

interface PreparedProduct {
	asset: ResolvedAsset;
	messaging: AdaptedMessaging;
}

interface WorkUnit {
	product: Product;
	productIndex: number;
	aspect: AspectSpec;
	aspectIndex: number;
}

/**
 * Pipeline Orchestrator
 *
 * For every product: resolve or produce a source image, adapt the copy
 * once, then compose one creative per aspect. Units of work are
 * (product, aspect) pairs run with bounded concurrency; a product's
 * preparation is shared by its three units. Per-item failures land in
 * the report and never stop the run.
 */
@Injectable()
export class PipelineService {
	private readonly logger = new Logger(PipelineService.name);

	constructor(
		private readonly configService: ConfigService,
		private readonly briefLoaderService: BriefLoaderService,
		private readonly assetResolverService: AssetResolverService,
		private readonly imageProducerService: ImageProducerService,
		private readonly messagingService: MessagingService,
		private readonly composerService: ComposerService,
		private readonly filesService: FilesService,
	) { }

	async run(options: RunOptions = {}): Promise<RunReport> {
		const briefPath = options.briefPath ?? this.configService.get<string>('app.briefPath') ?? 'briefs/campaign_brief.json';
		const brief = await this.briefLoaderService.load(briefPath);
		return this.runBrief(brief, options);
	}

	async runBrief(brief: CampaignBrief, options: Partial<PipelineRunOptions> = {}): Promise<RunReport> {
		const resolved = this.resolveOptions(options);
		await this.assetResolverService.checkAssetRoot(resolved.assetRoot);
		try {
			await this.filesService.ensureDir(resolved.outputRoot);
		} catch (error) {
			throw new PipelineConfigError(`${PipelineMessage.OUTPUT_ROOT_UNAVAILABLE}: ${resolved.outputRoot} (${errorMessage(error)})`);
		}

		const report = new RunReport(brief.campaign_id);
		const cache = this.messagingService.createCache();
		const preparations = new Map<string, Promise<PreparedProduct>>();
		const prepare = (product: Product): Promise<PreparedProduct> => {
			let pending = preparations.get(product.id);
			if (!pending) {
				pending = this.prepareProduct(product, brief, resolved, cache);
				preparations.set(product.id, pending);
			}
			return pending;
		};

		const units: WorkUnit[] = brief.products.flatMap((product, productIndex) =>
			ASPECT_SPECS.map((aspect, aspectIndex) => ({ product, productIndex, aspect, aspectIndex })),
		);

		this.logger.log(
			`🚀 Run ${report.run_id}: campaign "${brief.campaign_id}", ${brief.products.length} products × ${ASPECT_SPECS.length} aspects (concurrency ${resolved.concurrency})`,
		);

		await lastValueFrom(
			from(units).pipe(
				mergeMap(async (unit) => {
					const outcome = await this.runUnit(unit, brief, resolved.outputRoot, prepare);
					report.record(outcome);
					return outcome;
				}, resolved.concurrency),
				toArray(),
			),
		);

		report.finish();
		this.logger.log(`🏁 Run ${report.run_id} ${report.status}: ${report.succeeded.length}/${units.length} creatives written`);
		return report;
	}

	// ═══════════════════════════════════════════════════════════
	// UNITS
	// ═══════════════════════════════════════════════════════════

	private async prepareProduct(
		product: Product,
		brief: CampaignBrief,
		options: Required<PipelineRunOptions>,
		cache: MessagingCache,
	): Promise<PreparedProduct> {
		const asset =
			(await this.assetResolverService.resolve(product, options.assetRoot)) ??
			(await this.imageProducerService.produce(product, brief, options.generatedRoot));
		const messaging = await this.messagingService.adapt(brief, product, brief.locale, cache);
		return { asset, messaging };
	}

	private async runUnit(
		{ product, productIndex, aspect, aspectIndex }: WorkUnit,
		brief: CampaignBrief,
		outputRoot: string,
		prepare: (product: Product) => Promise<PreparedProduct>,
	): Promise<ItemOutcome> {
		const position = { product_id: product.id, aspect: aspect.name, product_index: productIndex, aspect_index: aspectIndex };

		let prepared: PreparedProduct;
		try {
			prepared = await prepare(product);
		} catch (error) {
			const reason = `${PipelineMessage.PREPARATION_FAILED}: ${errorMessage(error)}`;
			this.logger.error(`❌ [${product.id}/${aspect.name}] ${reason}`);
			return { ...position, status: OutcomeStatus.FAILED, reason };
		}

		const origin: AssetOrigin = prepared.asset.origin;
		try {
			const artifact = await this.composerService.compose(prepared.asset, aspect, prepared.messaging, brief, outputRoot);
			return { ...position, asset_origin: origin, status: OutcomeStatus.SUCCEEDED, path: artifact.path };
		} catch (error) {
			const reason = errorMessage(error);
			this.logger.error(`❌ [${product.id}/${aspect.name}] ${reason}`);
			return { ...position, asset_origin: origin, status: OutcomeStatus.FAILED, reason };
		}
	}

	private resolveOptions(options: Partial<PipelineRunOptions>): Required<PipelineRunOptions> {
		const concurrency = options.concurrency ?? this.configService.get<number>('app.concurrency') ?? 4;
		return {
			assetRoot: options.assetRoot ?? this.configService.get<string>('app.inputAssetsDir') ?? 'input-assets',
			outputRoot: options.outputRoot ?? this.configService.get<string>('app.outputRoot') ?? 'outputs',
			generatedRoot: options.generatedRoot ?? this.configService.get<string>('app.generatedAssetsDir') ?? 'generated-assets',
			concurrency: Number.isFinite(concurrency) && concurrency >= 1 ? Math.floor(concurrency) : 1,
		};
	}
}
