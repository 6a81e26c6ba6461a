import { Module } from '@nestjs/common';
import { FilesModule } from '../files/files.module';
import { ComposerService } from './composer.service';

@Module({
	imports: [FilesModule],
	providers: [ComposerService],
	exports: [ComposerService],
})
export class RenderModule { }
