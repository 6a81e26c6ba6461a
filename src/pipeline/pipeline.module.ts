import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AssetsModule } from '../assets/assets.module';
import { BriefModule } from '../brief/brief.module';
import { FilesModule } from '../files/files.module';
import { GeneratorModule } from '../generator/generator.module';
import { MessagingModule } from '../messaging/messaging.module';
import { RenderModule } from '../render/render.module';
import { PipelineService } from './pipeline.service';

@Module({
	imports: [ConfigModule, BriefModule, AssetsModule, GeneratorModule, MessagingModule, RenderModule, FilesModule],
	providers: [PipelineService],
	exports: [PipelineService],
})
export class PipelineModule { }
