import { IsArray, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { SAFE_ID_PATTERN } from '../../config';

export class ProductDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(128)
	@Matches(SAFE_ID_PATTERN, { message: 'id must be a filesystem-safe identifier' })
	id!: string;

	@IsString()
	@IsNotEmpty()
	name!: string;

	@IsString()
	@IsOptional()
	description?: string;

	@IsArray()
	@IsString({ each: true })
	@IsOptional()
	tags?: string[];

	/** Relative to the input asset directory */
	@IsString()
	@IsNotEmpty()
	@IsOptional()
	asset_path?: string;
}
