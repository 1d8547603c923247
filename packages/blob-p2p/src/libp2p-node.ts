import { createLibp2p, type Libp2p } from 'libp2p'
import { tcp } from '@libp2p/tcp'
import { noise } from '@chainsafe/libp2p-noise'
import { yamux } from '@chainsafe/libp2p-yamux'
import { identify, type Identify } from '@libp2p/identify'
import { ping, type PingService } from '@libp2p/ping'
import { gossipsub, type GossipsubEvents } from '@chainsafe/libp2p-gossipsub'
import { bootstrap } from '@libp2p/bootstrap'
import { mdns } from '@libp2p/mdns'
import type { PrivateKey, PubSub } from '@libp2p/interface'
import { artifactExchange, type ArtifactExchangeService } from './exchange/service.js'
import { networkPrefix } from './exchange/protocol.js'

export type Libp2pNodeOptions = {
	networkName: string
	/** Addresses listened on from start; further addresses can be added with `listen` */
	listen?: string[]
	bootstrapNodes?: string[]
	mdns?: boolean
	privateKey?: PrivateKey
	/** Largest content frame written in exchange responses */
	chunkSize?: number
}

export type BlobswarmServices = {
	identify: Identify
	ping: PingService
	pubsub: PubSub<GossipsubEvents>
	exchange: ArtifactExchangeService
}

export async function createLibp2pNode(options: Libp2pNodeOptions): Promise<Libp2p<BlobswarmServices>> {
	const protocolPrefix = networkPrefix(options.networkName)

	return await createLibp2p({
		...(options.privateKey != null ? { privateKey: options.privateKey } : {}),
		addresses: {
			listen: options.listen ?? []
		},
		connectionManager: {
			maxConnections: 64,
			inboundUpgradeTimeout: 10_000
		},
		transports: [tcp()],
		connectionEncrypters: [noise()],
		streamMuxers: [yamux()],
		peerDiscovery: [
			...(options.bootstrapNodes?.length ? [bootstrap({ list: options.bootstrapNodes })] : []),
			...(options.mdns === true ? [mdns()] : [])
		],
		services: {
			identify: identify({
				protocolPrefix: `blobswarm/${options.networkName}`
			}),
			ping: ping(),
			pubsub: gossipsub({
				allowPublishToZeroTopicPeers: true,
				heartbeatInterval: 7000
			}),
			exchange: artifactExchange({
				protocolPrefix,
				chunkSize: options.chunkSize
			})
		}
	})
}
