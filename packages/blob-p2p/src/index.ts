export * from './overlay/types.js'
export type { Swarm, SwarmEventSink, SwarmRequestOptions } from './overlay/swarm.js'
export { ReplySlot } from './overlay/reply-slot.js'
export { CommandChannel, DEFAULT_COMMAND_CAPACITY } from './overlay/command-channel.js'
export { OverlayEngine, type OverlayEngineInit } from './overlay/overlay-engine.js'
export * from './overlay/announcement.js'
export { NetworkClient, createNetwork, type Network, type NetworkInit, type RequestArtifactOptions } from './network-client.js'
export * from './exchange/protocol.js'
export * from './exchange/service.js'
export { createLibp2pNode, type BlobswarmServices, type Libp2pNodeOptions } from './libp2p-node.js'
export { Libp2pSwarm, type Libp2pSwarmInit } from './libp2p-swarm.js'
export type { IOriginRegistry } from './origin/i-origin-registry.js'
export { DockerHubRegistry, type DockerHubRegistryInit, type FetchFn } from './origin/docker-hub-registry.js'
export { RetrievalCascade, type ArtifactNetwork } from './cascade/retrieval-cascade.js'
export * from './config.js'
export { ArtifactNode, type ArtifactNodeComponents, type NodeStatus } from './node.js'
