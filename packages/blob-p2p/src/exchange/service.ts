import { decode as lpDecode, encode as lpEncode } from 'it-length-prefixed'
import { multiaddr, type Multiaddr } from '@multiformats/multiaddr'
import type {
	AbortOptions, Connection, IncomingStreamData, Logger, PeerId, Startable, StreamHandlerOptions
} from '@libp2p/interface'
import type { SwarmRequestOptions } from '../overlay/swarm.js'
import type { ArtifactId, ArtifactResponse } from '../overlay/types.js'
import {
	DEFAULT_CHUNK_SIZE, ResponseTooLargeError, decodeRequest, decodeResponse, encodeRequest, encodeResponse,
	exchangeProtocol, networkPrefix
} from './protocol.js'

export type ArtifactExchangeComponents = {
	logger: { forComponent: (name: string) => Logger },
	registrar: {
		handle: (protocol: string, handler: (data: IncomingStreamData) => void, options?: StreamHandlerOptions) => Promise<void>
		unhandle: (protocol: string) => Promise<void>
	},
	transportManager: {
		listen: (addrs: Multiaddr[]) => Promise<void>
	},
	connectionManager: {
		openConnection: (peer: PeerId, options?: AbortOptions) => Promise<Connection>
	}
}

export type ArtifactExchangeInit = {
	protocol?: string,
	protocolPrefix?: string,
	maxInboundStreams?: number,
	maxOutboundStreams?: number,
	/** Largest content frame written in a response */
	chunkSize?: number,
	logPrefix?: string
}

export interface InboundArtifactRequest {
	peer: PeerId
	hash: ArtifactId
	/** Writes the response and closes the stream; callable once */
	respond: (response: ArtifactResponse) => Promise<void>
}

export type InboundRequestHandler = (request: InboundArtifactRequest) => void

export function artifactExchange(init: ArtifactExchangeInit = {}): (components: ArtifactExchangeComponents) => ArtifactExchangeService {
	return (components: ArtifactExchangeComponents) => new ArtifactExchangeService(components, init)
}

/**
 * libp2p service speaking the artifact exchange protocol: one request frame carrying the
 * artifact id, answered by a status frame and the content.
 */
export class ArtifactExchangeService implements Startable {
	readonly protocol: string
	private readonly maxInboundStreams: number
	private readonly maxOutboundStreams: number
	private readonly chunkSize: number
	private readonly log: Logger
	private running = false
	private handler: InboundRequestHandler | undefined

	constructor(private readonly components: ArtifactExchangeComponents, init: ArtifactExchangeInit = {}) {
		this.protocol = init.protocol ?? exchangeProtocol(init.protocolPrefix ?? networkPrefix('default'))
		this.maxInboundStreams = init.maxInboundStreams ?? 32
		this.maxOutboundStreams = init.maxOutboundStreams ?? 64
		this.chunkSize = init.chunkSize ?? DEFAULT_CHUNK_SIZE
		this.log = components.logger.forComponent(init.logPrefix ?? 'blobswarm:exchange')
	}

	readonly [Symbol.toStringTag] = '@blobswarm/artifact-exchange'

	async start(): Promise<void> {
		if (this.running) {
			return
		}

		await this.components.registrar.handle(this.protocol, this.handleIncomingStream.bind(this), {
			maxInboundStreams: this.maxInboundStreams,
			maxOutboundStreams: this.maxOutboundStreams
		})

		this.running = true
	}

	async stop(): Promise<void> {
		if (!this.running) {
			return
		}

		await this.components.registrar.unhandle(this.protocol)
		this.handler = undefined
		this.running = false
	}

	/** Route inbound requests to `handler`; without one, requests are answered with an error */
	setRequestHandler(handler: InboundRequestHandler | undefined): void {
		this.handler = handler
	}

	/** Start listening on an additional address after the node has started */
	async listen(address: string): Promise<void> {
		await this.components.transportManager.listen([multiaddr(address)])
	}

	/**
	 * Ask one peer for an artifact. Aborting `options.signal` aborts the stream, as does content
	 * beyond `options.maxBytes`.
	 */
	async request(peer: PeerId, hash: ArtifactId, options: SwarmRequestOptions = {}): Promise<ArtifactResponse> {
		const connection = await this.components.connectionManager.openConnection(peer, options)
		const stream = await connection.newStream(this.protocol, options)
		const onAbort = (): void => {
			stream.abort(new Error(`request for ${hash} aborted`))
		}
		options.signal?.addEventListener('abort', onAbort, { once: true })

		try {
			await stream.sink(lpEncode([encodeRequest(hash)]))
			return await decodeResponse(lpDecode(stream.source), options.maxBytes)
		} catch (err) {
			if (err instanceof ResponseTooLargeError) stream.abort(err)
			throw err
		} finally {
			options.signal?.removeEventListener('abort', onAbort)
			if (stream.status === 'open') {
				await stream.close().catch(err => { this.log('closing request stream to %p failed - %e', peer, err) })
			}
		}
	}

	private handleIncomingStream(data: IncomingStreamData): void {
		const { stream, connection } = data
		const peer = connection.remotePeer

		this.serve(data).catch(err => {
			this.log.error('error handling artifact request from %p - %e', peer, err)
			stream.abort(err instanceof Error ? err : new Error(String(err)))
		})
	}

	private async serve({ stream, connection }: IncomingStreamData): Promise<void> {
		let hash: ArtifactId | undefined
		for await (const frame of lpDecode(stream.source)) {
			hash = decodeRequest(frame)
			break
		}
		if (hash == null) {
			throw new Error('stream closed before a request frame arrived')
		}

		let answered = false
		const respond = async (response: ArtifactResponse): Promise<void> => {
			if (answered) throw new Error(`request for ${hash} already answered`)
			answered = true
			await stream.sink(lpEncode(encodeResponse(response, this.chunkSize)))
		}

		const handler = this.handler
		if (handler == null) {
			await respond({ status: 'error', message: 'node is not serving artifacts' })
			return
		}
		this.log('request for %s from %p', hash, connection.remotePeer)
		handler({ peer: connection.remotePeer, hash, respond })
	}
}
