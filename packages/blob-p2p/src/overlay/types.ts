import type { ReplySlot } from './reply-slot.js'

/** Peer id string of a node; derived from the node's key pair at start-up */
export type PeerIdentity = string

/** Artifact identifier in `"<alg>:<hex>"` form */
export type ArtifactId = string

export type ArtifactResponse =
	| { status: 'ok', content: Uint8Array }
	| { status: 'not-found' }
	| { status: 'error', message: string }

/** Broadcast traffic on the overlay topic */
export type Announcement =
	| { type: 'provide', hashes: ArtifactId[] }
	| { type: 'unprovide', hashes: ArtifactId[] }
	| { type: 'want', hash: ArtifactId }

/** Answers one inbound request; the swarm implementation owns the underlying stream */
export interface ResponseChannel {
	send(response: ArtifactResponse): Promise<void>
}

export type Command =
	| { type: 'listen', address: string, reply: ReplySlot<void> }
	| { type: 'dial', peer: PeerIdentity, address: string, reply: ReplySlot<void> }
	| { type: 'start-providing', hashes: ArtifactId[], reply: ReplySlot<void> }
	| { type: 'stop-providing', hash: ArtifactId, reply: ReplySlot<void> }
	| { type: 'get-providers', hash: ArtifactId, reply: ReplySlot<PeerIdentity[]> }
	| { type: 'request-artifact', peer: PeerIdentity, hash: ArtifactId, maxBytes?: number, reply: ReplySlot<Uint8Array> }
	| { type: 'respond-artifact', channelId: number, response: ArtifactResponse, reply: ReplySlot<void> }
	| { type: 'list-peers', reply: ReplySlot<PeerIdentity[]> }

/** Raised by the swarm toward the engine */
export type SwarmEvent =
	| { type: 'peer-discovered', peer: PeerIdentity }
	| { type: 'peer-connected', peer: PeerIdentity }
	| { type: 'peer-disconnected', peer: PeerIdentity }
	| { type: 'announcement', from: PeerIdentity, message: Announcement }
	| { type: 'inbound-request', peer: PeerIdentity, hash: ArtifactId, channel: ResponseChannel }

/** Completion of work the engine started outside its loop */
export type EngineEvent =
	| SwarmEvent
	| { type: 'response-received', requestId: number, outcome: { response: ArtifactResponse } | { error: Error } }
	| { type: 'request-expired', requestId: number }
	| { type: 'inbound-expired', channelId: number }
	| { type: 'query-expired', hash: ArtifactId }
	| { type: 'sweep' }

export type EngineInput = Command | EngineEvent

/** Delivered to the application when a remote peer asks for an artifact */
export interface InboundEvent {
	channelId: number
	peer: PeerIdentity
	hash: ArtifactId
}
