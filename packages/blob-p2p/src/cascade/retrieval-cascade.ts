import {
	IntegrityMismatchError, IoError, NoProvidersError, NotFoundLocallyError, OriginNotFoundError,
	OriginUnauthorizedError, QuotaExceededError, parseArtifactId, type ArtifactHash, type IArtifactStore
} from '@blobswarm/core'
import { createLogger } from '../logger.js'
import type { NetworkClient } from '../network-client.js'
import type { IOriginRegistry } from '../origin/i-origin-registry.js'

const log = createLogger('cascade')

/** The part of the network client the cascade drives */
export type ArtifactNetwork = Pick<NetworkClient, 'peerId' | 'listProviders' | 'requestArtifact' | 'provide'>

/**
 * Resolves an artifact from the local store, then one peer, then the origin registry.
 * Content from either remote tier is verified by the store's `put` and advertised afterwards.
 */
export class RetrievalCascade {
	constructor(
		private readonly store: IArtifactStore,
		private readonly network: ArtifactNetwork,
		private readonly origin: IOriginRegistry
	) { }

	async resolve(name: string, id: string): Promise<Uint8Array> {
		const hash = parseArtifactId(id)

		const local = await this.fromStore(hash)
		if (local != null) {
			log('%s served locally', id)
			return local
		}

		try {
			await this.fromPeers(hash, id)
		} catch (err) {
			if (err instanceof QuotaExceededError) throw err
			log('peer tier failed for %s, falling back to origin - %o', id, err)
			await this.fromOrigin(name, hash, id)
		}

		await this.network.provide(hash)
			.catch(err => { log('advertising %s failed - %o', id, err) })

		return await this.store.get(hash)
	}

	private async fromStore(hash: ArtifactHash): Promise<Uint8Array | undefined> {
		try {
			return await this.store.get(hash)
		} catch (err) {
			if (err instanceof NotFoundLocallyError) return undefined
			throw err
		}
	}

	/** Exactly one remote provider is tried */
	private async fromPeers(hash: ArtifactHash, id: string): Promise<void> {
		const providers = await this.network.listProviders(hash)
		const peer = [...providers].find(candidate => candidate !== this.network.peerId)
		if (peer == null) {
			throw new NoProvidersError(id)
		}
		const content = await this.network.requestArtifact(peer, hash, { maxBytes: this.store.availableSpace() })
		await this.store.put(hash, [content])
		log('%s fetched from peer %s', id, peer)
	}

	private async fromOrigin(name: string, hash: ArtifactHash, id: string): Promise<void> {
		try {
			const token = await this.origin.authenticate(name)
			const content = await this.origin.fetchBlob(name, id, token)
			await this.store.put(hash, content)
		} catch (err) {
			if (
				err instanceof OriginUnauthorizedError || err instanceof OriginNotFoundError || err instanceof IoError
				|| err instanceof IntegrityMismatchError || err instanceof QuotaExceededError
			) {
				throw err
			}
			throw new IoError(`Fetching ${id} from origin failed`, { cause: err })
		}
		log('%s fetched from origin', id)
	}
}
