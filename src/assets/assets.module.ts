import { Module } from '@nestjs/common';
import { AssetResolverService } from './asset-resolver.service';

@Module({
	providers: [AssetResolverService],
	exports: [AssetResolverService],
})
export class AssetsModule { }
