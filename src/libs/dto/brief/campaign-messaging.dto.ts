import { IsOptional, IsString } from 'class-validator';

/**
 * Brief-level copy. `description` is the older name for `subheading`;
 * the loader folds it in when `subheading` is absent.
 */
export class CampaignMessagingDto {
	@IsString()
	@IsOptional()
	headline?: string;

	@IsString()
	@IsOptional()
	subheading?: string;

	@IsString()
	@IsOptional()
	description?: string;

	@IsString()
	@IsOptional()
	call_to_action?: string;
}
