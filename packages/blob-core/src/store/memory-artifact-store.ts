import { Uint8ArrayList } from 'uint8arraylist';
import { equals as u8Equals } from 'uint8arrays/equals';
import { createDigester, formatArtifactId, parseArtifactId, type ArtifactHash } from '../artifact-hash.js';
import { IntegrityMismatchError, NotFoundLocallyError } from '../errors.js';
import type { ArtifactSource, IArtifactStore, StoreUsage } from './i-artifact-store.js';
import { QuotaLedger } from './quota.js';

export class MemoryArtifactStore implements IArtifactStore {
	private readonly blobs = new Map<string, Uint8Array>(); // artifact id -> content
	private readonly ledger: QuotaLedger;

	constructor(allocatedBytes: number = Number.MAX_SAFE_INTEGER) {
		this.ledger = new QuotaLedger(allocatedBytes);
	}

	async put(hash: ArtifactHash, content: ArtifactSource): Promise<boolean> {
		const id = formatArtifactId(hash);
		if (this.blobs.has(id)) return false;

		const digester = createDigester(hash.algorithm);
		const buffer = new Uint8ArrayList();
		for await (const chunk of content) {
			this.ledger.ensure(buffer.byteLength + chunk.byteLength);
			digester.update(chunk);
			buffer.append(chunk.slice());
		}

		const actual = digester.digest();
		if (!u8Equals(actual, hash.digest)) {
			throw new IntegrityMismatchError(id, formatArtifactId({ algorithm: hash.algorithm, digest: actual }));
		}

		// A concurrent put may have landed while this one was consuming its source
		if (this.blobs.has(id)) return false;
		this.ledger.commit(buffer.byteLength);
		this.blobs.set(id, buffer.subarray());
		return true;
	}

	async get(hash: ArtifactHash): Promise<Uint8Array> {
		const id = formatArtifactId(hash);
		const content = this.blobs.get(id);
		if (!content) throw new NotFoundLocallyError(id);
		return content.slice();
	}

	async has(hash: ArtifactHash): Promise<boolean> {
		return this.blobs.has(formatArtifactId(hash));
	}

	async *list(): AsyncIterable<ArtifactHash> {
		for (const id of [...this.blobs.keys()]) {
			yield parseArtifactId(id);
		}
	}

	availableSpace(): number {
		return this.ledger.available();
	}

	usage(): StoreUsage {
		return this.ledger.usage();
	}
}
