import type { AbortOptions } from '@libp2p/interface'
import type { Announcement, ArtifactId, ArtifactResponse, PeerIdentity, SwarmEvent } from './types.js'

export type SwarmEventSink = (event: SwarmEvent) => void

export interface SwarmRequestOptions extends AbortOptions {
	/** Fail the transfer once the peer sends more content than this */
	maxBytes?: number
}

/**
 * The network operations the overlay engine drives. Implementations report everything they
 * observe through the sink given to `start` and never mutate engine state themselves.
 */
export interface Swarm {
	readonly peerId: PeerIdentity
	start(sink: SwarmEventSink): Promise<void>
	stop(): Promise<void>
	listen(address: string): Promise<void>
	dial(peer: PeerIdentity, address: string): Promise<void>
	/** Open a broadcast link to a newly discovered peer */
	addToPartialView(peer: PeerIdentity): Promise<void>
	removeFromPartialView(peer: PeerIdentity): Promise<void>
	publish(message: Announcement): Promise<void>
	request(peer: PeerIdentity, hash: ArtifactId, options?: SwarmRequestOptions): Promise<ArtifactResponse>
}
