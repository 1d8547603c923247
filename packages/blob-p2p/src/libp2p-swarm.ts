import type { Libp2p } from 'libp2p'
import type { Message, PeerId, PeerInfo } from '@libp2p/interface'
import { peerIdFromString } from '@libp2p/peer-id'
import { multiaddr } from '@multiformats/multiaddr'
import { createLogger } from './logger.js'
import { decodeAnnouncement, encodeAnnouncement } from './overlay/announcement.js'
import type { Swarm, SwarmEventSink, SwarmRequestOptions } from './overlay/swarm.js'
import type { Announcement, ArtifactId, ArtifactResponse, PeerIdentity } from './overlay/types.js'
import type { BlobswarmServices } from './libp2p-node.js'

const log = createLogger('swarm')

export interface Libp2pSwarmInit {
	/** Gossip topic carrying provide/want announcements */
	topic: string
	dialTimeoutMs?: number
}

/** {@link Swarm} over a started libp2p node: gossipsub for announcements, the exchange service for transfers */
export class Libp2pSwarm implements Swarm {
	readonly peerId: PeerIdentity
	private readonly topic: string
	private readonly dialTimeoutMs: number
	private sink: SwarmEventSink | undefined

	constructor(private readonly node: Libp2p<BlobswarmServices>, init: Libp2pSwarmInit) {
		this.peerId = node.peerId.toString()
		this.topic = init.topic
		this.dialTimeoutMs = init.dialTimeoutMs ?? 10_000
	}

	async start(sink: SwarmEventSink): Promise<void> {
		this.sink = sink
		this.node.addEventListener('peer:discovery', this.onDiscovery)
		this.node.addEventListener('peer:connect', this.onConnect)
		this.node.addEventListener('peer:disconnect', this.onDisconnect)

		const pubsub = this.node.services.pubsub
		pubsub.addEventListener('message', this.onMessage)
		pubsub.subscribe(this.topic)

		this.node.services.exchange.setRequestHandler(({ peer, hash, respond }) => {
			sink({ type: 'inbound-request', peer: peer.toString(), hash, channel: { send: respond } })
		})

		for (const peer of this.node.getPeers()) {
			sink({ type: 'peer-connected', peer: peer.toString() })
		}
		log('subscribed to %s', this.topic)
	}

	async stop(): Promise<void> {
		this.node.removeEventListener('peer:discovery', this.onDiscovery)
		this.node.removeEventListener('peer:connect', this.onConnect)
		this.node.removeEventListener('peer:disconnect', this.onDisconnect)
		const pubsub = this.node.services.pubsub
		pubsub.removeEventListener('message', this.onMessage)
		pubsub.unsubscribe(this.topic)
		this.node.services.exchange.setRequestHandler(undefined)
		this.sink = undefined
		await this.node.stop()
	}

	async listen(address: string): Promise<void> {
		await this.node.services.exchange.listen(address)
		log('listening on %s', address)
	}

	async dial(peer: PeerIdentity, address: string): Promise<void> {
		let ma = multiaddr(address)
		const embedded = ma.getPeerId()
		if (embedded == null) {
			ma = ma.encapsulate(`/p2p/${peer}`)
		} else if (embedded !== peer) {
			throw new Error(`Address ${address} names peer ${embedded}, expected ${peer}`)
		}
		await this.node.dial(ma, { signal: AbortSignal.timeout(this.dialTimeoutMs) })
	}

	async addToPartialView(peer: PeerIdentity): Promise<void> {
		await this.node.dial(peerIdFromString(peer), { signal: AbortSignal.timeout(this.dialTimeoutMs) })
	}

	async removeFromPartialView(peer: PeerIdentity): Promise<void> {
		await this.node.hangUp(peerIdFromString(peer))
	}

	async publish(message: Announcement): Promise<void> {
		await this.node.services.pubsub.publish(this.topic, encodeAnnouncement(message))
	}

	async request(peer: PeerIdentity, hash: ArtifactId, options?: SwarmRequestOptions): Promise<ArtifactResponse> {
		return await this.node.services.exchange.request(peerIdFromString(peer), hash, options)
	}

	private readonly onDiscovery = (event: CustomEvent<PeerInfo>): void => {
		this.sink?.({ type: 'peer-discovered', peer: event.detail.id.toString() })
	}

	private readonly onConnect = (event: CustomEvent<PeerId>): void => {
		this.sink?.({ type: 'peer-connected', peer: event.detail.toString() })
	}

	private readonly onDisconnect = (event: CustomEvent<PeerId>): void => {
		this.sink?.({ type: 'peer-disconnected', peer: event.detail.toString() })
	}

	private readonly onMessage = (event: CustomEvent<Message>): void => {
		const message = event.detail
		if (message.topic !== this.topic) return
		if (message.type !== 'signed') {
			log('dropping unsigned announcement')
			return
		}
		const announcement = decodeAnnouncement(message.data)
		if (announcement == null) {
			log('dropping malformed announcement from %s', message.from.toString())
			return
		}
		this.sink?.({ type: 'announcement', from: message.from.toString(), message: announcement })
	}
}
