/**
 * Single-use completion handle carried by every command.
 * The first resolve/reject wins; later attempts are ignored and reported as `false`.
 */
export class ReplySlot<T> {
	readonly promise: Promise<T>
	private resolvePromise: (value: T) => void = () => {}
	private rejectPromise: (err: Error) => void = () => {}
	private settled = false

	constructor() {
		this.promise = new Promise<T>((resolve, reject) => {
			this.resolvePromise = resolve
			this.rejectPromise = reject
		})
	}

	get isSettled(): boolean {
		return this.settled
	}

	resolve(value: T): boolean {
		if (this.settled) return false
		this.settled = true
		this.resolvePromise(value)
		return true
	}

	reject(err: Error): boolean {
		if (this.settled) return false
		this.settled = true
		this.rejectPromise(err)
		return true
	}
}
