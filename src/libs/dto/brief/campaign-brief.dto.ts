import {
	ArrayMinSize,
	IsArray,
	IsNotEmpty,
	IsObject,
	IsOptional,
	IsString,
	Matches,
	MaxLength,
	ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { SAFE_ID_PATTERN } from '../../config';
import { CampaignMessagingDto } from './campaign-messaging.dto';
import { ProductDto } from './product.dto';

/**
 * Campaign Brief DTO
 *
 * Shape of the brief JSON file. Colors are only checked for type here;
 * the composer rejects unparseable values per item.
 */
export class CampaignBriefDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(128)
	@Matches(SAFE_ID_PATTERN, { message: 'campaign_id must be a filesystem-safe identifier' })
	campaign_id!: string;

	@IsString()
	@IsNotEmpty()
	campaign_name!: string;

	@IsString()
	@IsNotEmpty()
	brand_name!: string;

	@IsString()
	@IsOptional()
	primary_color?: string;

	@IsString()
	@IsOptional()
	secondary_color?: string;

	@IsString()
	@IsNotEmpty()
	@IsOptional()
	font_family?: string;

	@IsString()
	@IsNotEmpty()
	@IsOptional()
	font_path?: string;

	@IsOptional()
	@ValidateNested()
	@Type(() => CampaignMessagingDto)
	messaging?: CampaignMessagingDto;

	@IsString()
	@IsNotEmpty()
	@IsOptional()
	locale?: string;

	@IsObject()
	@IsOptional()
	demographics?: Record<string, unknown>;

	@IsArray()
	@ArrayMinSize(1)
	@ValidateNested({ each: true })
	@Type(() => ProductDto)
	products!: ProductDto[];
}
