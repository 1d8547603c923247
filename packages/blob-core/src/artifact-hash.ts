import { sha256, sha512 } from '@noble/hashes/sha2';
import { equals as u8Equals } from 'uint8arrays/equals';
import { fromString as u8FromString } from 'uint8arrays/from-string';
import { toString as u8ToString } from 'uint8arrays/to-string';
import { InvalidArtifactIdError } from './errors.js';

export type HashAlgorithm = 'sha256' | 'sha512';

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['sha256', 'sha512'];

const DIGEST_LENGTHS: Record<HashAlgorithm, number> = {
	sha256: 32,
	sha512: 64
};

/** Width of the `"<alg>:"` prefix on artifact ids; identical for every supported algorithm */
export const ID_PREFIX_LENGTH = 7;

export interface ArtifactHash {
	readonly algorithm: HashAlgorithm;
	readonly digest: Uint8Array;
}

/** Incremental digest over a byte stream */
export interface Digester {
	update(chunk: Uint8Array): void;
	digest(): Uint8Array;
}

export function isHashAlgorithm(value: string): value is HashAlgorithm {
	return HASH_ALGORITHMS.some(algorithm => algorithm === value);
}

export function createDigester(algorithm: HashAlgorithm): Digester {
	const hash = algorithm === 'sha256' ? sha256.create() : sha512.create();
	return {
		update: (chunk) => { hash.update(chunk); },
		digest: () => hash.digest()
	};
}

export function computeArtifactHash(content: Uint8Array, algorithm: HashAlgorithm = 'sha256'): ArtifactHash {
	const digester = createDigester(algorithm);
	digester.update(content);
	return { algorithm, digest: digester.digest() };
}

/**
 * Decodes the `"sha256:<hex>"` form used on the wire and by the registry API.
 * The first {@link ID_PREFIX_LENGTH} characters name the algorithm; the remainder must be
 * the lowercase hex digest of exactly that algorithm's length.
 */
export function parseArtifactId(id: string): ArtifactHash {
	const prefix = id.slice(0, ID_PREFIX_LENGTH);
	if (prefix.length < ID_PREFIX_LENGTH || !prefix.endsWith(':')) {
		throw new InvalidArtifactIdError(id, 'missing algorithm prefix');
	}
	const algorithm = prefix.slice(0, -1);
	if (!isHashAlgorithm(algorithm)) {
		throw new InvalidArtifactIdError(id, `unsupported algorithm ${algorithm}`);
	}
	const hex = id.slice(ID_PREFIX_LENGTH);
	if (!/^[0-9a-f]*$/.test(hex)) {
		throw new InvalidArtifactIdError(id, 'digest is not lowercase hex');
	}
	if (hex.length !== DIGEST_LENGTHS[algorithm] * 2) {
		throw new InvalidArtifactIdError(id, `expected ${DIGEST_LENGTHS[algorithm] * 2} hex digits, got ${hex.length}`);
	}
	return { algorithm, digest: u8FromString(hex, 'base16') };
}

export function formatArtifactId(hash: ArtifactHash): string {
	return `${hash.algorithm}:${u8ToString(hash.digest, 'base16')}`;
}

export function hashesEqual(a: ArtifactHash, b: ArtifactHash): boolean {
	return a.algorithm === b.algorithm && u8Equals(a.digest, b.digest);
}
