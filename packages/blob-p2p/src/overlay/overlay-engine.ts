import { pushable, type Pushable } from 'it-pushable'
import merge from 'it-merge'
import {
	EngineStoppedError, PeerTimeoutError, PeerTransferFailedError, ResponseChannelClosedError
} from '@blobswarm/core'
import { createLogger } from '../logger.js'
import { batchHashes } from './announcement.js'
import type { CommandChannel } from './command-channel.js'
import type { ReplySlot } from './reply-slot.js'
import type { Swarm } from './swarm.js'
import type {
	Announcement, ArtifactId, ArtifactResponse, Command, EngineEvent, EngineInput, InboundEvent,
	PeerIdentity, ResponseChannel
} from './types.js'

const log = createLogger('overlay:engine')

export interface OverlayEngineInit {
	/** Deadline for a RequestArtifact exchange */
	requestTimeoutMs?: number
	/** How long an inbound request waits for the application's answer */
	inboundTimeoutMs?: number
	/** A discovered peer leaves the partial view when not re-announced within this window */
	discoveryTtlMs?: number
	/** Remote provider records expire unless re-announced within this window */
	providerTtlMs?: number
	/** Interval at which this node re-announces everything it provides */
	reprovideIntervalMs?: number
	/** How long GetProviders waits for a `want` to be answered when nothing is known */
	providerQueryMs?: number
	/** Interval of the housekeeping sweep */
	sweepIntervalMs?: number
}

interface PendingRequest {
	peer: PeerIdentity
	hash: ArtifactId
	reply: ReplySlot<Uint8Array>
	timer: ReturnType<typeof setTimeout>
	abort: AbortController
}

interface PendingInbound {
	peer: PeerIdentity
	hash: ArtifactId
	channel: ResponseChannel
	timer: ReturnType<typeof setTimeout>
}

interface PendingQuery {
	replies: ReplySlot<PeerIdentity[]>[]
	timer: ReturnType<typeof setTimeout>
}

/**
 * Sole owner of the overlay's state. Commands and network events are consumed from one merged
 * stream and handled one at a time, so nothing here needs locking. Work that completes outside
 * the loop (exchanges, timers) re-enters as an {@link EngineEvent}.
 */
export class OverlayEngine {
	private readonly cfg: Required<OverlayEngineInit>
	private readonly events: Pushable<EngineEvent> = pushable<EngineEvent>({ objectMode: true })
	private readonly inboundEvents: Pushable<InboundEvent> = pushable<InboundEvent>({ objectMode: true })

	/** Discovered peers -> last time discovery vouched for them */
	private readonly partialView = new Map<PeerIdentity, number>()
	private readonly connected = new Set<PeerIdentity>()
	private readonly providing = new Set<ArtifactId>()
	/** hash -> provider -> expiry */
	private readonly providers = new Map<ArtifactId, Map<PeerIdentity, number>>()
	private readonly pendingRequests = new Map<number, PendingRequest>()
	private readonly pendingInbound = new Map<number, PendingInbound>()
	private readonly pendingQueries = new Map<ArtifactId, PendingQuery>()

	private nextId = 0
	private lastReprovide = 0
	private sweepTimer: ReturnType<typeof setInterval> | undefined
	private loop: Promise<void> | undefined
	private stopped = false

	constructor(
		private readonly swarm: Swarm,
		private readonly commands: CommandChannel,
		init: OverlayEngineInit = {}
	) {
		this.cfg = {
			requestTimeoutMs: init.requestTimeoutMs ?? 30_000,
			inboundTimeoutMs: init.inboundTimeoutMs ?? 30_000,
			discoveryTtlMs: init.discoveryTtlMs ?? 120_000,
			providerTtlMs: init.providerTtlMs ?? 10 * 60_000,
			reprovideIntervalMs: init.reprovideIntervalMs ?? 5 * 60_000,
			providerQueryMs: init.providerQueryMs ?? 2_000,
			sweepIntervalMs: init.sweepIntervalMs ?? 5_000
		}
	}

	get peerId(): PeerIdentity {
		return this.swarm.peerId
	}

	/** Requests this node's application must answer through RespondArtifact */
	get inbound(): AsyncIterable<InboundEvent> {
		return this.inboundEvents
	}

	/** Outstanding RequestArtifact exchanges */
	get pendingRequestCount(): number {
		return this.pendingRequests.size
	}

	async start(): Promise<void> {
		if (this.loop != null) return
		await this.swarm.start((event) => { this.post(event) })
		this.lastReprovide = Date.now()
		this.sweepTimer = setInterval(() => { this.post({ type: 'sweep' }) }, this.cfg.sweepIntervalMs)
		this.sweepTimer.unref()
		this.loop = this.run().catch((err) => {
			log.extend('error')('engine loop failed - %o', err)
		})
		log('started as %s', this.swarm.peerId)
	}

	async stop(): Promise<void> {
		if (this.stopped) return
		this.stopped = true
		clearInterval(this.sweepTimer)
		this.commands.close()
		this.events.end()
		await this.loop

		const stoppedError = new EngineStoppedError()
		for (const pending of this.pendingRequests.values()) {
			clearTimeout(pending.timer)
			pending.abort.abort(stoppedError)
			pending.reply.reject(stoppedError)
		}
		this.pendingRequests.clear()
		for (const [channelId, pending] of this.pendingInbound) {
			clearTimeout(pending.timer)
			this.answer(channelId, pending, { status: 'error', message: 'node is shutting down' })
		}
		this.pendingInbound.clear()
		for (const query of this.pendingQueries.values()) {
			clearTimeout(query.timer)
			query.replies.forEach(reply => reply.reject(stoppedError))
		}
		this.pendingQueries.clear()
		this.inboundEvents.end()

		await this.swarm.stop()
		log('stopped')
	}

	private post(event: EngineEvent): void {
		if (!this.stopped) this.events.push(event)
	}

	private async run(): Promise<void> {
		for await (const input of merge<EngineInput>(this.commands, this.events)) {
			try {
				this.dispatch(input)
			} catch (err) {
				log('failed handling %s - %o', input.type, err)
			}
		}
	}

	private dispatch(input: EngineInput): void {
		switch (input.type) {
			case 'listen':
			case 'dial':
			case 'start-providing':
			case 'stop-providing':
			case 'get-providers':
			case 'request-artifact':
			case 'respond-artifact':
			case 'list-peers':
				if (this.stopped) {
					input.reply.reject(new EngineStoppedError())
					return
				}
				this.handleCommand(input)
				return
			case 'peer-discovered':
			case 'peer-connected':
			case 'peer-disconnected':
			case 'announcement':
			case 'inbound-request':
			case 'response-received':
			case 'request-expired':
			case 'inbound-expired':
			case 'query-expired':
			case 'sweep':
				this.handleEvent(input)
				return
			default:
				assertNever(input)
		}
	}

	private handleCommand(command: Command): void {
		switch (command.type) {
			case 'listen':
				this.swarm.listen(command.address).then(
					() => { command.reply.resolve() },
					(err) => { command.reply.reject(toError(err)) }
				)
				return
			case 'dial':
				this.swarm.dial(command.peer, command.address).then(
					() => { command.reply.resolve() },
					(err) => { command.reply.reject(toError(err)) }
				)
				return
			case 'start-providing':
				for (const hash of command.hashes) this.providing.add(hash)
				for (const hashes of batchHashes(command.hashes)) {
					this.announce({ type: 'provide', hashes })
				}
				command.reply.resolve()
				return
			case 'stop-providing':
				if (this.providing.delete(command.hash)) {
					this.announce({ type: 'unprovide', hashes: [command.hash] })
				}
				command.reply.resolve()
				return
			case 'get-providers':
				this.getProviders(command.hash, command.reply)
				return
			case 'request-artifact':
				this.requestArtifact(command.peer, command.hash, command.maxBytes, command.reply)
				return
			case 'respond-artifact': {
				const pending = this.pendingInbound.get(command.channelId)
				if (pending == null) {
					command.reply.reject(new ResponseChannelClosedError(command.channelId))
					return
				}
				this.pendingInbound.delete(command.channelId)
				clearTimeout(pending.timer)
				this.answer(command.channelId, pending, command.response, command.reply)
				return
			}
			case 'list-peers':
				command.reply.resolve([...new Set([...this.partialView.keys(), ...this.connected])])
				return
			default:
				assertNever(command)
		}
	}

	private handleEvent(event: EngineEvent): void {
		switch (event.type) {
			case 'peer-discovered': {
				if (event.peer === this.swarm.peerId) return
				const known = this.partialView.has(event.peer)
				this.partialView.set(event.peer, Date.now())
				if (!known) {
					log('discovered %s', event.peer)
					this.swarm.addToPartialView(event.peer)
						.catch(err => { log('adding %s to partial view failed - %o', event.peer, err) })
				}
				return
			}
			case 'peer-connected':
				this.connected.add(event.peer)
				return
			case 'peer-disconnected':
				this.connected.delete(event.peer)
				return
			case 'announcement':
				this.onAnnouncement(event.from, event.message)
				return
			case 'inbound-request': {
				const channelId = ++this.nextId
				const timer = setTimeout(() => { this.post({ type: 'inbound-expired', channelId }) }, this.cfg.inboundTimeoutMs)
				timer.unref()
				this.pendingInbound.set(channelId, { peer: event.peer, hash: event.hash, channel: event.channel, timer })
				this.inboundEvents.push({ channelId, peer: event.peer, hash: event.hash })
				return
			}
			case 'response-received': {
				const pending = this.pendingRequests.get(event.requestId)
				if (pending == null) {
					log('late response for request %d ignored', event.requestId)
					return
				}
				this.pendingRequests.delete(event.requestId)
				clearTimeout(pending.timer)
				this.completeRequest(pending, event.outcome)
				return
			}
			case 'request-expired': {
				const pending = this.pendingRequests.get(event.requestId)
				if (pending == null) return
				this.pendingRequests.delete(event.requestId)
				const err = new PeerTimeoutError(pending.peer, pending.hash, this.cfg.requestTimeoutMs)
				pending.abort.abort(err)
				pending.reply.reject(err)
				log('request %d for %s to %s timed out', event.requestId, pending.hash, pending.peer)
				return
			}
			case 'inbound-expired': {
				const pending = this.pendingInbound.get(event.channelId)
				if (pending == null) return
				this.pendingInbound.delete(event.channelId)
				this.answer(event.channelId, pending, { status: 'error', message: 'no response from application' })
				return
			}
			case 'query-expired': {
				const query = this.pendingQueries.get(event.hash)
				if (query == null) return
				this.pendingQueries.delete(event.hash)
				const known = this.knownProviders(event.hash)
				query.replies.forEach(reply => reply.resolve(known))
				return
			}
			case 'sweep':
				this.sweep()
				return
			default:
				assertNever(event)
		}
	}

	private getProviders(hash: ArtifactId, reply: ReplySlot<PeerIdentity[]>): void {
		const known = this.knownProviders(hash)
		if (known.length > 0 || this.cfg.providerQueryMs <= 0) {
			reply.resolve(known)
			return
		}
		const existing = this.pendingQueries.get(hash)
		if (existing != null) {
			existing.replies.push(reply)
			return
		}
		const timer = setTimeout(() => { this.post({ type: 'query-expired', hash }) }, this.cfg.providerQueryMs)
		timer.unref()
		this.pendingQueries.set(hash, { replies: [reply], timer })
		this.announce({ type: 'want', hash })
	}

	private requestArtifact(peer: PeerIdentity, hash: ArtifactId, maxBytes: number | undefined, reply: ReplySlot<Uint8Array>): void {
		const requestId = ++this.nextId
		const abort = new AbortController()
		const timer = setTimeout(() => { this.post({ type: 'request-expired', requestId }) }, this.cfg.requestTimeoutMs)
		timer.unref()
		this.pendingRequests.set(requestId, { peer, hash, reply, timer, abort })

		this.swarm.request(peer, hash, { signal: abort.signal, maxBytes }).then(
			(response) => { this.post({ type: 'response-received', requestId, outcome: { response } }) },
			(err) => { this.post({ type: 'response-received', requestId, outcome: { error: toError(err) } }) }
		)
	}

	private completeRequest(pending: PendingRequest, outcome: { response: ArtifactResponse } | { error: Error }): void {
		const { peer, hash, reply } = pending
		if ('error' in outcome) {
			reply.reject(new PeerTransferFailedError(peer, hash, outcome.error.message, { cause: outcome.error }))
			return
		}
		const { response } = outcome
		switch (response.status) {
			case 'ok':
				reply.resolve(response.content)
				return
			case 'not-found':
				reply.reject(new PeerTransferFailedError(peer, hash, 'peer does not hold the artifact'))
				return
			case 'error':
				reply.reject(new PeerTransferFailedError(peer, hash, response.message))
				return
			default:
				assertNever(response)
		}
	}

	private answer(channelId: number, pending: PendingInbound, response: ArtifactResponse, reply?: ReplySlot<void>): void {
		pending.channel.send(response).then(
			() => { reply?.resolve() },
			(err) => {
				log('answering inbound request %d for %s from %s failed - %o', channelId, pending.hash, pending.peer, err)
				reply?.reject(toError(err))
			}
		)
	}

	private onAnnouncement(from: PeerIdentity, message: Announcement): void {
		if (from === this.swarm.peerId) return
		switch (message.type) {
			case 'provide': {
				const expires = Date.now() + this.cfg.providerTtlMs
				for (const hash of message.hashes) {
					let entries = this.providers.get(hash)
					if (entries == null) {
						entries = new Map()
						this.providers.set(hash, entries)
					}
					entries.set(from, expires)
					this.resolveQuery(hash)
				}
				return
			}
			case 'unprovide':
				for (const hash of message.hashes) {
					const entries = this.providers.get(hash)
					entries?.delete(from)
					if (entries?.size === 0) this.providers.delete(hash)
				}
				return
			case 'want':
				if (this.providing.has(message.hash)) {
					this.announce({ type: 'provide', hashes: [message.hash] })
				}
				return
			default:
				assertNever(message)
		}
	}

	private resolveQuery(hash: ArtifactId): void {
		const query = this.pendingQueries.get(hash)
		if (query == null) return
		this.pendingQueries.delete(hash)
		clearTimeout(query.timer)
		const known = this.knownProviders(hash)
		query.replies.forEach(reply => reply.resolve(known))
	}

	private knownProviders(hash: ArtifactId): PeerIdentity[] {
		const now = Date.now()
		const remote = [...(this.providers.get(hash)?.entries() ?? [])]
			.filter(([, expires]) => expires > now)
			.map(([peer]) => peer)
		return this.providing.has(hash) ? [this.swarm.peerId, ...remote] : remote
	}

	private sweep(): void {
		const now = Date.now()

		for (const [peer, seen] of this.partialView) {
			if (seen + this.cfg.discoveryTtlMs > now || this.connected.has(peer)) continue
			this.partialView.delete(peer)
			log('discovery expired for %s', peer)
			this.swarm.removeFromPartialView(peer)
				.catch(err => { log('removing %s from partial view failed - %o', peer, err) })
		}

		for (const [hash, entries] of this.providers) {
			for (const [peer, expires] of entries) {
				if (expires <= now) entries.delete(peer)
			}
			if (entries.size === 0) this.providers.delete(hash)
		}

		if (now - this.lastReprovide >= this.cfg.reprovideIntervalMs && this.providing.size > 0) {
			this.lastReprovide = now
			for (const hashes of batchHashes([...this.providing])) {
				this.announce({ type: 'provide', hashes })
			}
		}
	}

	private announce(message: Announcement): void {
		this.swarm.publish(message)
			.catch(err => { log('publishing %s failed - %o', message.type, err) })
	}
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err))
}

function assertNever(value: never): never {
	throw new Error(`Unhandled variant: ${JSON.stringify(value)}`)
}
