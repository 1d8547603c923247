import { multiaddr } from '@multiformats/multiaddr'
import type { NetworkInit } from './network-client.js'
import type { DockerHubRegistryInit } from './origin/docker-hub-registry.js'

export const DEFAULT_ALLOCATED_BYTES = 10 * 1024 ** 3

export type NodeOptions = {
	networkName?: string
	/** Multiaddrs to listen on once the engine runs */
	listen?: string[]
	/** Peers dialed at start-up; each multiaddr must end in `/p2p/<peer-id>` */
	peers?: string[]
	/** Bootstrap discovery list */
	bootstrapNodes?: string[]
	mdns?: boolean
	storagePath?: string
	/** Space budget of the artifact store in bytes */
	allocatedBytes?: number
	/** Base64 protobuf-encoded private key; a fresh Ed25519 key is generated when absent */
	privateKey?: string
	dialTimeoutMs?: number
	overlay?: NetworkInit
	origin?: DockerHubRegistryInit
}

export type ResolvedNodeOptions = Required<Omit<NodeOptions, 'privateKey'>> & Pick<NodeOptions, 'privateKey'>

export function resolveNodeOptions(options: NodeOptions = {}): ResolvedNodeOptions {
	const allocatedBytes = options.allocatedBytes ?? DEFAULT_ALLOCATED_BYTES
	if (!Number.isSafeInteger(allocatedBytes) || allocatedBytes < 0) {
		throw new Error(`allocatedBytes must be a non-negative integer, got ${allocatedBytes}`)
	}
	const peers = options.peers ?? []
	for (const address of peers) {
		peerOfAddress(address)
	}

	return {
		networkName: options.networkName ?? 'default',
		listen: options.listen ?? ['/ip4/0.0.0.0/tcp/44000'],
		peers,
		bootstrapNodes: options.bootstrapNodes ?? [],
		mdns: options.mdns ?? true,
		storagePath: options.storagePath ?? 'blobswarm-data',
		allocatedBytes,
		privateKey: options.privateKey,
		dialTimeoutMs: options.dialTimeoutMs ?? 10_000,
		overlay: options.overlay ?? {},
		origin: options.origin ?? {}
	}
}

/** The peer id embedded in a dial address */
export function peerOfAddress(address: string): string {
	const peer = multiaddr(address).getPeerId()
	if (peer == null) {
		throw new Error(`Peer address ${address} must include /p2p/<peer-id>`)
	}
	return peer
}
