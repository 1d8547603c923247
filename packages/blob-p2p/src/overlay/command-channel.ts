import { pushable, type Pushable } from 'it-pushable'
import { EngineStoppedError } from '@blobswarm/core'
import type { Command } from './types.js'

export const DEFAULT_COMMAND_CAPACITY = 64

interface WaitingSender {
	command: Command
	resolve: () => void
	reject: (err: Error) => void
}

/**
 * Bounded, ordered queue of commands from any number of client handles to the engine.
 * Senders only wait while the buffer is full, and are admitted oldest first as the
 * consumer takes commands.
 */
export class CommandChannel implements AsyncIterable<Command> {
	private readonly queue: Pushable<Command> = pushable<Command>({ objectMode: true })
	private readonly waiting: WaitingSender[] = []
	private closed = false

	constructor(readonly capacity: number = DEFAULT_COMMAND_CAPACITY) {
		if (capacity < 1) throw new Error(`command channel capacity must be at least 1, got ${capacity}`)
	}

	get isClosed(): boolean {
		return this.closed
	}

	/** Commands buffered and not yet taken by the consumer */
	get pending(): number {
		return this.queue.readableLength
	}

	/** Senders held back by a full buffer */
	get waitingSenders(): number {
		return this.waiting.length
	}

	async send(command: Command): Promise<void> {
		if (this.closed) throw new EngineStoppedError()
		if (this.waiting.length === 0 && this.queue.readableLength < this.capacity) {
			this.queue.push(command)
			return
		}
		await new Promise<void>((resolve, reject) => {
			this.waiting.push({ command, resolve, reject })
		})
	}

	close(): void {
		if (this.closed) return
		this.closed = true
		for (const sender of this.waiting.splice(0)) {
			sender.reject(new EngineStoppedError())
		}
		this.queue.end()
	}

	async * [Symbol.asyncIterator](): AsyncGenerator<Command, void, undefined> {
		for await (const command of this.queue) {
			this.admit()
			yield command
		}
	}

	private admit(): void {
		while (!this.closed && this.queue.readableLength < this.capacity) {
			const next = this.waiting.shift()
			if (next == null) return
			this.queue.push(next.command)
			next.resolve()
		}
	}
}
