import type { ArtifactHash } from '../artifact-hash.js';

/** Chunks of artifact content, in order */
export type ArtifactSource = Iterable<Uint8Array> | AsyncIterable<Uint8Array>;

export interface StoreUsage {
	/** Configured space budget in bytes */
	allocated: number;
	/** Bytes held by committed artifacts */
	used: number;
	/** Number of committed artifacts */
	count: number;
}

export interface IArtifactStore {
	/**
	 * Verify and persist content under `hash`.
	 * @returns false when the hash was already stored and nothing was written
	 * @throws IntegrityMismatchError, QuotaExceededError, IoError
	 */
	put(hash: ArtifactHash, content: ArtifactSource): Promise<boolean>;
	/** @throws NotFoundLocallyError when nothing is stored under `hash` */
	get(hash: ArtifactHash): Promise<Uint8Array>;
	has(hash: ArtifactHash): Promise<boolean>;
	list(): AsyncIterable<ArtifactHash>;
	availableSpace(): number;
	usage(): StoreUsage;
}
