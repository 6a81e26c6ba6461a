import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { PipelineConfigError } from '../common/errors/pipeline.errors';
import { slugify } from '../common/utils/slugify.util';
import { IMAGE_EXTENSIONS } from '../libs/config';
import { AssetOrigin } from '../libs/enums';
import { PipelineMessage } from '../libs/messages';
import { Product, ResolvedAsset } from '../libs/types/pipeline.types';

/**
 * Asset Resolver
 *
 * Finds reusable product photography in the input asset directory.
 * Order of precedence:
 * 1. `asset_path` on the product, relative to the asset root
 * 2. file stem equal to the product id
 * 3. file stem equal to the product name, then to the slugged name
 * 4. file stem containing the slugged product id
 * All stem comparisons are case-insensitive; candidates are visited in
 * sorted relative-path order so the same library always gives the same answer.
 */
@Injectable()
export class AssetResolverService {
	private readonly logger = new Logger(AssetResolverService.name);

	/**
	 * A missing root is tolerated (every product misses); a root that
	 * exists but is not a directory is a configuration error.
	 */
	async checkAssetRoot(assetRoot: string): Promise<boolean> {
		let stat: fs.Stats;
		try {
			stat = await fs.promises.stat(assetRoot);
		} catch {
			this.logger.warn(`⚠️ Input asset directory ${assetRoot} does not exist — every product will be produced`);
			return false;
		}
		if (!stat.isDirectory()) {
			throw new PipelineConfigError(`${PipelineMessage.ASSET_ROOT_NOT_DIRECTORY}: ${assetRoot}`);
		}
		return true;
	}

	/** Returns null when nothing matches; that is the expected miss, not a failure. */
	async resolve(product: Product, assetRoot: string): Promise<ResolvedAsset | null> {
		const root = path.resolve(assetRoot);
		if (!(await this.isDirectory(root))) {
			return null;
		}

		if (product.asset_path) {
			const explicit = await this.resolveExplicit(product.asset_path, root);
			if (explicit) {
				this.logger.log(`📁 [${product.id}] Reusing asset_path ${product.asset_path}`);
				return { product_id: product.id, path: explicit, origin: AssetOrigin.REUSED };
			}
			this.logger.warn(`⚠️ [${product.id}] asset_path ${product.asset_path} not found under ${assetRoot}, trying filename match`);
		}

		const candidates = await this.listImages(root);
		const match = this.matchByStem(product, candidates);
		if (!match) {
			this.logger.log(`🔍 [${product.id}] No existing asset found`);
			return null;
		}

		this.logger.log(`📁 [${product.id}] Reusing ${match}`);
		return { product_id: product.id, path: path.join(root, match), origin: AssetOrigin.REUSED };
	}

	private async resolveExplicit(assetPath: string, root: string): Promise<string | null> {
		const candidate = path.resolve(root, assetPath);
		const relative = path.relative(root, candidate);
		if (relative.startsWith('..') || path.isAbsolute(relative)) {
			this.logger.warn(`⚠️ asset_path ${assetPath} points outside the asset directory — ignored`);
			return null;
		}
		try {
			const stat = await fs.promises.stat(candidate);
			return stat.isFile() ? candidate : null;
		} catch {
			return null;
		}
	}

	private matchByStem(product: Product, candidates: string[]): string | null {
		const id = product.id.toLowerCase();
		const name = product.name.toLowerCase();
		const nameSlug = slugify(product.name);
		const idSlug = slugify(product.id);

		const stems = candidates.map((file) => ({
			file,
			stem: path.basename(file, path.extname(file)).toLowerCase(),
		}));

		const rules: Array<(stem: string) => boolean> = [
			(stem) => stem === id,
			(stem) => stem === name,
			(stem) => stem === nameSlug,
			(stem) => stem.includes(idSlug),
		];

		for (const rule of rules) {
			const hit = stems.find(({ stem }) => rule(stem));
			if (hit) return hit.file;
		}
		return null;
	}

	/** Image files under root, as sorted POSIX-style relative paths */
	private async listImages(root: string): Promise<string[]> {
		const found: string[] = [];
		const walk = async (dir: string): Promise<void> => {
			const entries = await fs.promises.readdir(dir, { withFileTypes: true });
			for (const entry of entries) {
				const full = path.join(dir, entry.name);
				if (entry.isDirectory()) {
					await walk(full);
				} else if (entry.isFile() && this.isImage(entry.name)) {
					found.push(path.relative(root, full).split(path.sep).join('/'));
				}
			}
		};
		await walk(root);
		return found.sort();
	}

	private isImage(fileName: string): boolean {
		const ext = path.extname(fileName).toLowerCase();
		return IMAGE_EXTENSIONS.some((allowed) => allowed === ext);
	}

	private async isDirectory(dir: string): Promise<boolean> {
		try {
			return (await fs.promises.stat(dir)).isDirectory();
		} catch {
			return false;
		}
	}
}
