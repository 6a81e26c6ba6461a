import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import * as fs from 'fs';
import * as path from 'path';
import { BriefValidationError } from '../common/errors/pipeline.errors';
import { BRIEF_DEFAULTS } from '../libs/config';
import { CampaignBriefDto } from '../libs/dto';
import { BriefMessage } from '../libs/messages';
import { CampaignBrief, Product } from '../libs/types/pipeline.types';

@Injectable()
export class BriefLoaderService {
	private readonly logger = new Logger(BriefLoaderService.name);

	/**
	 * Read, validate and normalize a brief file.
	 * Relative `font_path` values resolve against the brief's directory.
	 */
	async load(briefPath: string): Promise<CampaignBrief> {
		let text: string;
		try {
			text = await fs.promises.readFile(briefPath, 'utf-8');
		} catch (error) {
			const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
			throw new BriefValidationError(
				missing ? `${BriefMessage.BRIEF_NOT_FOUND}: ${briefPath}` : `${BriefMessage.BRIEF_UNREADABLE}: ${briefPath}`,
			);
		}

		let raw: unknown;
		try {
			raw = JSON.parse(text);
		} catch {
			throw new BriefValidationError(`${BriefMessage.BRIEF_INVALID_JSON}: ${briefPath}`);
		}

		const brief = await this.parse(raw, path.dirname(path.resolve(briefPath)));
		this.logger.log(`📋 Loaded brief "${brief.campaign_id}" (${brief.products.length} products, locale ${brief.locale})`);
		return brief;
	}

	async parse(raw: unknown, baseDir: string = process.cwd()): Promise<CampaignBrief> {
		if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
			throw new BriefValidationError(BriefMessage.BRIEF_NOT_OBJECT);
		}

		const dto = plainToInstance(CampaignBriefDto, raw);
		const errors = await validate(dto);
		if (errors.length > 0) {
			throw new BriefValidationError(BriefMessage.BRIEF_INVALID, this.flattenErrors(errors));
		}

		const seen = new Set<string>();
		const duplicates = new Set<string>();
		for (const product of dto.products) {
			if (seen.has(product.id)) duplicates.add(product.id);
			seen.add(product.id);
		}
		if (duplicates.size > 0) {
			throw new BriefValidationError(BriefMessage.DUPLICATE_PRODUCT_ID, [...duplicates].map((id) => `duplicate id "${id}"`));
		}

		const products: Product[] = dto.products.map((product) => ({
			id: product.id,
			name: product.name,
			description: product.description ?? '',
			tags: [...new Set(product.tags ?? [])],
			...(product.asset_path ? { asset_path: product.asset_path } : {}),
		}));

		const messaging = dto.messaging;
		const subheading = messaging?.subheading || messaging?.description;

		const brief: CampaignBrief = {
			campaign_id: dto.campaign_id,
			campaign_name: dto.campaign_name,
			brand_name: dto.brand_name,
			primary_color: dto.primary_color ?? BRIEF_DEFAULTS.primary_color,
			secondary_color: dto.secondary_color ?? BRIEF_DEFAULTS.secondary_color,
			font: {
				family: dto.font_family ?? BRIEF_DEFAULTS.font_family,
				...(dto.font_path ? { path: path.resolve(baseDir, dto.font_path) } : {}),
			},
			messaging: {
				headline: messaging?.headline || dto.campaign_name,
				...(subheading ? { subheading } : {}),
				...(messaging?.call_to_action ? { call_to_action: messaging.call_to_action } : {}),
			},
			locale: dto.locale ?? BRIEF_DEFAULTS.locale,
			demographics: dto.demographics ?? {},
			products,
		};

		return deepFreeze(brief);
	}

	private flattenErrors(errors: ValidationError[], parent = ''): string[] {
		return errors.flatMap((error) => {
			const property = parent ? `${parent}.${error.property}` : error.property;
			const own = Object.values(error.constraints ?? {}).map((message) => `${property}: ${message}`);
			return [...own, ...this.flattenErrors(error.children ?? [], property)];
		});
	}
}

function deepFreeze<T>(value: T): T {
	if (value && typeof value === 'object') {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}
