import { promises as fs } from 'fs';
import * as path from 'path';
import { randomBytes } from 'node:crypto';
import { equals as u8Equals } from 'uint8arrays/equals';
import { toString as u8ToString } from 'uint8arrays/to-string';
import {
	createDigester, formatArtifactId, isHashAlgorithm, parseArtifactId, type ArtifactHash
} from '../artifact-hash.js';
import { IntegrityMismatchError, IoError, NotFoundLocallyError, QuotaExceededError, isErrnoCode } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ArtifactSource, IArtifactStore, StoreUsage } from './i-artifact-store.js';
import { QuotaLedger } from './quota.js';

const log = createLogger('store:file');

export interface FileArtifactStoreInit {
	/** Space budget in bytes */
	allocatedBytes: number;
}

export class FileArtifactStore implements IArtifactStore {
	private readonly ledger: QuotaLedger;
	/** Artifact ids currently being promoted out of staging */
	private readonly committing = new Set<string>();
	private opening: Promise<void> | undefined;

	constructor(private readonly basePath: string, init: FileArtifactStoreInit) {
		this.ledger = new QuotaLedger(init.allocatedBytes);
	}

	/** Prepare directories, discard leftover staging files and rebuild space accounting from disk */
	async open(): Promise<void> {
		this.opening ??= this.initialize();
		await this.opening;
	}

	private async initialize(): Promise<void> {
		try {
			await fs.rm(this.getStagingRoot(), { recursive: true, force: true });
			await fs.mkdir(this.getStagingRoot(), { recursive: true });
			await fs.mkdir(this.getBlobRoot(), { recursive: true });
			for await (const hash of this.list()) {
				const stat = await fs.stat(this.getBlobPath(hash));
				this.ledger.record(stat.size);
			}
		} catch (err) {
			throw new IoError(`Failed to open artifact store at ${this.basePath}`, { cause: err });
		}
		log('opened %s - %o', this.basePath, this.ledger.usage());
	}

	async put(hash: ArtifactHash, content: ArtifactSource): Promise<boolean> {
		const id = formatArtifactId(hash);
		if (await this.has(hash)) {
			log('put %s skipped, already stored', id);
			return false;
		}

		await this.open();
		const stagingPath = path.join(this.getStagingRoot(), `${u8ToString(randomBytes(12), 'base16')}.partial`);
		const digester = createDigester(hash.algorithm);
		let written = 0;

		try {
			const handle = await fs.open(stagingPath, 'wx').catch(err => {
				throw new IoError(`Failed to create staging file for ${id}`, { cause: err });
			});
			try {
				for await (const chunk of content) {
					written += chunk.byteLength;
					this.ledger.ensure(written);
					digester.update(chunk);
					await handle.write(chunk);
				}
			} finally {
				await handle.close();
			}

			const actual = digester.digest();
			if (!u8Equals(actual, hash.digest)) {
				throw new IntegrityMismatchError(id, formatArtifactId({ algorithm: hash.algorithm, digest: actual }));
			}

			return await this.promote(hash, stagingPath, written);
		} catch (err) {
			await this.discard(stagingPath);
			if (err instanceof IntegrityMismatchError || err instanceof QuotaExceededError || err instanceof IoError) throw err;
			throw new IoError(`Failed to store ${id}`, { cause: err });
		}
	}

	async get(hash: ArtifactHash): Promise<Uint8Array> {
		const id = formatArtifactId(hash);
		return fs.readFile(this.getBlobPath(hash))
			.then(content => new Uint8Array(content.buffer, content.byteOffset, content.byteLength))
			.catch(err => {
				if (isErrnoCode(err, 'ENOENT')) throw new NotFoundLocallyError(id);
				throw new IoError(`Failed to read ${id}`, { cause: err });
			});
	}

	async has(hash: ArtifactHash): Promise<boolean> {
		return fs.access(this.getBlobPath(hash))
			.then(() => true)
			.catch(err => {
				if (isErrnoCode(err, 'ENOENT')) return false;
				throw new IoError(`Failed to check ${formatArtifactId(hash)}`, { cause: err });
			});
	}

	async *list(): AsyncIterable<ArtifactHash> {
		const algorithms = await this.readDirIfExists(this.getBlobRoot());
		for (const algorithm of algorithms) {
			if (!isHashAlgorithm(algorithm)) continue;
			for (const shard of await this.readDirIfExists(path.join(this.getBlobRoot(), algorithm))) {
				for (const file of await this.readDirIfExists(path.join(this.getBlobRoot(), algorithm, shard))) {
					try {
						yield parseArtifactId(`${algorithm}:${file}`);
					} catch (err) {
						log('list skipping unexpected file %s/%s/%s - %o', algorithm, shard, file, err);
					}
				}
			}
		}
	}

	availableSpace(): number {
		return this.ledger.available();
	}

	usage(): StoreUsage {
		return this.ledger.usage();
	}

	/**
	 * Move a verified staging file into place. Availability is checked and reserved in the same
	 * synchronous step, immediately before the rename.
	 */
	private async promote(hash: ArtifactHash, stagingPath: string, size: number): Promise<boolean> {
		const id = formatArtifactId(hash);
		if (this.committing.has(id)) {
			await this.discard(stagingPath);
			return false;
		}
		this.committing.add(id);
		try {
			if (await this.has(hash)) {
				await this.discard(stagingPath);
				return false;
			}
			const blobPath = this.getBlobPath(hash);
			this.ledger.commit(size);
			try {
				await fs.mkdir(path.dirname(blobPath), { recursive: true });
				await fs.rename(stagingPath, blobPath);
			} catch (err) {
				this.ledger.release(size);
				throw new IoError(`Failed to promote ${id}`, { cause: err });
			}
			log('stored %s (%d bytes)', id, size);
			return true;
		} finally {
			this.committing.delete(id);
		}
	}

	private async discard(stagingPath: string): Promise<void> {
		await fs.unlink(stagingPath)
			.catch((err) => {
				if (!isErrnoCode(err, 'ENOENT')) log('discard unlink failed for %s - %o', stagingPath, err);
			});
	}

	private async readDirIfExists(dirPath: string): Promise<string[]> {
		return fs.readdir(dirPath)
			.catch(err => {
				if (isErrnoCode(err, 'ENOENT')) return [];
				throw err;
			});
	}

	private getBlobRoot(): string {
		return path.join(this.basePath, 'blobs');
	}

	private getStagingRoot(): string {
		return path.join(this.basePath, 'staging');
	}

	private getBlobPath(hash: ArtifactHash): string {
		const hex = u8ToString(hash.digest, 'base16');
		return path.join(this.getBlobRoot(), hash.algorithm, hex.slice(0, 2), hex);
	}
}
