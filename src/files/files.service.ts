import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { AspectName } from '../libs/types/pipeline.types';

@Injectable()
export class FilesService {
	private readonly logger = new Logger(FilesService.name);

	/**
	 * `{outputRoot}/{campaign}/{product}/{aspect}/{campaign}_{product}_{aspect}.png`
	 */
	artifactPath(outputRoot: string, campaignId: string, productId: string, aspect: AspectName): string {
		return path.join(outputRoot, campaignId, productId, aspect, `${campaignId}_${productId}_${aspect}.png`);
	}

	generatedAssetPath(generatedRoot: string, productId: string): string {
		return path.join(generatedRoot, `${productId}.png`);
	}

	mockAssetPath(generatedRoot: string, productId: string): string {
		return path.join(generatedRoot, 'mock', `${productId}.png`);
	}

	/** Safe to call concurrently for the same directory */
	async ensureDir(dir: string): Promise<void> {
		await fs.promises.mkdir(dir, { recursive: true });
	}

	async exists(filePath: string): Promise<boolean> {
		try {
			const stat = await fs.promises.stat(filePath);
			return stat.isFile();
		} catch {
			return false;
		}
	}

	/**
	 * Write an image buffer, creating parent directories. Overwrites.
	 * Goes through a temp file so concurrent readers never see a partial PNG.
	 */
	async storeImage(filePath: string, buffer: Buffer): Promise<string> {
		await this.ensureDir(path.dirname(filePath));
		const tempPath = `${filePath}.${process.pid}.tmp`;
		await fs.promises.writeFile(tempPath, buffer);
		await fs.promises.rename(tempPath, filePath);
		this.logger.debug(`📁 Local: ${filePath} (${buffer.length} bytes)`);
		return filePath;
	}
}
