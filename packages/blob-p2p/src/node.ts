import { privateKeyFromProtobuf } from '@libp2p/crypto/keys'
import { fromString as u8FromString } from 'uint8arrays/from-string'
import {
	FileArtifactStore, InvalidArtifactIdError, NotFoundLocallyError, parseArtifactId, type ArtifactHash, type IArtifactStore
} from '@blobswarm/core'
import { RetrievalCascade } from './cascade/retrieval-cascade.js'
import { peerOfAddress, resolveNodeOptions, type NodeOptions, type ResolvedNodeOptions } from './config.js'
import { announcementTopic } from './exchange/protocol.js'
import { createLibp2pNode } from './libp2p-node.js'
import { Libp2pSwarm } from './libp2p-swarm.js'
import { createLogger } from './logger.js'
import { createNetwork, type NetworkClient } from './network-client.js'
import { DockerHubRegistry } from './origin/docker-hub-registry.js'
import type { IOriginRegistry } from './origin/i-origin-registry.js'
import type { OverlayEngine } from './overlay/overlay-engine.js'
import type { Swarm } from './overlay/swarm.js'
import type { ArtifactResponse, InboundEvent, PeerIdentity } from './overlay/types.js'

const log = createLogger('node')

export interface NodeStatus {
	artifactCount: number
	peerCount: number
	/** Allocated store space in bytes */
	diskAllocated: number
	/** Share of the allocation in use, in percent */
	diskUsage: number
}

export interface ArtifactNodeComponents {
	store: IArtifactStore & { open?: () => Promise<void> }
	swarm: Swarm
	origin: IOriginRegistry
}

/**
 * A running peer: serves stored artifacts to the network and resolves artifacts for local callers
 * through the retrieval cascade.
 */
export class ArtifactNode {
	private readonly store: ArtifactNodeComponents['store']
	private readonly engine: OverlayEngine
	private readonly client: NetworkClient
	private readonly cascade: RetrievalCascade
	private serving: Promise<void> | undefined

	constructor(components: ArtifactNodeComponents, private readonly options: ResolvedNodeOptions) {
		this.store = components.store
		const { engine, client } = createNetwork(components.swarm, options.overlay)
		this.engine = engine
		this.client = client
		this.cascade = new RetrievalCascade(this.store, client.clone(), components.origin)
	}

	/** Build a node on libp2p, a file store and the Docker Hub origin */
	static async create(options: NodeOptions = {}): Promise<ArtifactNode> {
		const resolved = resolveNodeOptions(options)
		const libp2p = await createLibp2pNode({
			networkName: resolved.networkName,
			bootstrapNodes: resolved.bootstrapNodes,
			mdns: resolved.mdns,
			privateKey: resolved.privateKey != null
				? privateKeyFromProtobuf(u8FromString(resolved.privateKey, 'base64pad'))
				: undefined
		})
		const swarm = new Libp2pSwarm(libp2p, {
			topic: announcementTopic(resolved.networkName),
			dialTimeoutMs: resolved.dialTimeoutMs
		})
		const store = new FileArtifactStore(resolved.storagePath, { allocatedBytes: resolved.allocatedBytes })
		return new ArtifactNode({ store, swarm, origin: new DockerHubRegistry(resolved.origin) }, resolved)
	}

	get peerId(): PeerIdentity {
		return this.client.peerId
	}

	async start(): Promise<void> {
		await this.store.open?.()
		await this.engine.start()

		for (const address of this.options.listen) {
			await this.client.listen(address)
		}
		for (const address of this.options.peers) {
			await this.client.dial(peerOfAddress(address), address)
				.catch(err => { log('dialing %s failed - %o', address, err) })
		}

		this.serving = this.serveInbound()
		await this.advertiseStored()
		log('node %s started', this.peerId)
	}

	async stop(): Promise<void> {
		await this.engine.stop()
		await this.serving
		log('node %s stopped', this.peerId)
	}

	async resolve(name: string, id: string): Promise<Uint8Array> {
		return await this.cascade.resolve(name, id)
	}

	async listPeers(): Promise<PeerIdentity[]> {
		return [...await this.client.listPeers()]
	}

	async status(): Promise<NodeStatus> {
		const usage = this.store.usage()
		const peers = await this.client.listPeers()
		return {
			artifactCount: usage.count,
			peerCount: peers.size,
			diskAllocated: usage.allocated,
			diskUsage: usage.allocated > 0 ? (usage.used * 100) / usage.allocated : 0
		}
	}

	private async serveInbound(): Promise<void> {
		for await (const event of this.engine.inbound) {
			this.answer(event)
				.catch(err => { log('answering %s for %s failed - %o', event.hash, event.peer, err) })
		}
	}

	private async answer({ channelId, peer, hash }: InboundEvent): Promise<void> {
		let response: ArtifactResponse
		try {
			response = { status: 'ok', content: await this.store.get(parseArtifactId(hash)) }
		} catch (err) {
			if (err instanceof NotFoundLocallyError) {
				response = { status: 'not-found' }
			} else if (err instanceof InvalidArtifactIdError) {
				response = { status: 'error', message: err.message }
			} else {
				log('reading %s for %s failed - %o', hash, peer, err)
				response = { status: 'error', message: 'failed to read artifact' }
			}
		}
		await this.client.respondArtifact(channelId, response)
	}

	private async advertiseStored(): Promise<void> {
		const hashes: ArtifactHash[] = []
		for await (const hash of this.store.list()) hashes.push(hash)
		if (hashes.length === 0) return
		await this.client.provideAll(hashes)
		log('advertised %d stored artifacts', hashes.length)
	}
}
