import { formatArtifactId, type ArtifactHash } from '@blobswarm/core'
import { CommandChannel } from './overlay/command-channel.js'
import { OverlayEngine, type OverlayEngineInit } from './overlay/overlay-engine.js'
import { ReplySlot } from './overlay/reply-slot.js'
import type { Swarm } from './overlay/swarm.js'
import type { ArtifactResponse, Command, PeerIdentity } from './overlay/types.js'

export interface RequestArtifactOptions {
	maxBytes?: number
}

/**
 * Cloneable handle onto a running {@link OverlayEngine}. Every call becomes one command carrying
 * its own reply slot; clones share the same command channel.
 */
export class NetworkClient {
	constructor(
		private readonly channel: CommandChannel,
		readonly peerId: PeerIdentity
	) { }

	clone(): NetworkClient {
		return new NetworkClient(this.channel, this.peerId)
	}

	async listen(address: string): Promise<void> {
		return this.submit<void>(reply => ({ type: 'listen', address, reply }))
	}

	async dial(peer: PeerIdentity, address: string): Promise<void> {
		return this.submit<void>(reply => ({ type: 'dial', peer, address, reply }))
	}

	/** Announce this node as a provider of the artifact */
	async provide(hash: ArtifactHash): Promise<void> {
		return this.provideAll([hash])
	}

	/** Announce several artifacts at once, batched into as few announcements as fit */
	async provideAll(hashes: ArtifactHash[]): Promise<void> {
		const ids = hashes.map(hash => formatArtifactId(hash))
		return this.submit<void>(reply => ({ type: 'start-providing', hashes: ids, reply }))
	}

	async stopProviding(hash: ArtifactHash): Promise<void> {
		const id = formatArtifactId(hash)
		return this.submit<void>(reply => ({ type: 'stop-providing', hash: id, reply }))
	}

	/** Known live providers; includes this node when it provides the artifact itself */
	async listProviders(hash: ArtifactHash): Promise<Set<PeerIdentity>> {
		const id = formatArtifactId(hash)
		const peers = await this.submit<PeerIdentity[]>(reply => ({ type: 'get-providers', hash: id, reply }))
		return new Set(peers)
	}

	async listPeers(): Promise<Set<PeerIdentity>> {
		const peers = await this.submit<PeerIdentity[]>(reply => ({ type: 'list-peers', reply }))
		return new Set(peers)
	}

	/**
	 * Fetch the raw content of an artifact from one peer. The bytes are not verified here.
	 * A transfer larger than `options.maxBytes` fails as soon as the limit is crossed.
	 */
	async requestArtifact(peer: PeerIdentity, hash: ArtifactHash, options: RequestArtifactOptions = {}): Promise<Uint8Array> {
		const id = formatArtifactId(hash)
		const { maxBytes } = options
		return this.submit<Uint8Array>(reply => ({ type: 'request-artifact', peer, hash: id, maxBytes, reply }))
	}

	/** Answer an inbound request; a channel accepts exactly one response */
	async respondArtifact(channelId: number, response: ArtifactResponse): Promise<void> {
		return this.submit<void>(reply => ({ type: 'respond-artifact', channelId, response, reply }))
	}

	private async submit<T>(build: (reply: ReplySlot<T>) => Command): Promise<T> {
		const reply = new ReplySlot<T>()
		await this.channel.send(build(reply))
		return reply.promise
	}
}

export interface NetworkInit extends OverlayEngineInit {
	/** Commands buffered before senders wait */
	commandCapacity?: number
}

export interface Network {
	engine: OverlayEngine
	client: NetworkClient
}

/** Wire an engine and its first client over a fresh command channel. The engine still has to be started. */
export function createNetwork(swarm: Swarm, init: NetworkInit = {}): Network {
	const channel = new CommandChannel(init.commandCapacity)
	const engine = new OverlayEngine(swarm, channel, init)
	return { engine, client: new NetworkClient(channel, swarm.peerId) }
}
