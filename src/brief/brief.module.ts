import { Module } from '@nestjs/common';
import { BriefLoaderService } from './brief-loader.service';

@Module({
	providers: [BriefLoaderService],
	exports: [BriefLoaderService],
})
export class BriefModule { }
