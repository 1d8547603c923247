/** Recomputed digest disagrees with the claimed hash. Never retried against the same source. */
export class IntegrityMismatchError extends Error {
	constructor(readonly expected: string, readonly actual: string) {
		super(`Integrity mismatch: expected ${expected} but content hashed to ${actual}`);
		this.name = 'IntegrityMismatchError';
	}
}

export class QuotaExceededError extends Error {
	constructor(readonly requested: number, readonly available: number) {
		super(`Quota exceeded: ${requested} bytes requested, ${available} bytes available`);
		this.name = 'QuotaExceededError';
	}
}

export class NotFoundLocallyError extends Error {
	constructor(readonly id: string) {
		super(`Artifact ${id} not found locally`);
		this.name = 'NotFoundLocallyError';
	}
}

export class NoProvidersError extends Error {
	constructor(readonly id: string) {
		super(`No providers known for ${id}`);
		this.name = 'NoProvidersError';
	}
}

export class PeerTimeoutError extends Error {
	constructor(readonly peer: string, readonly id: string, readonly timeoutMs: number) {
		super(`Peer ${peer} did not answer for ${id} within ${timeoutMs}ms`);
		this.name = 'PeerTimeoutError';
	}
}

export class PeerTransferFailedError extends Error {
	constructor(readonly peer: string, readonly id: string, reason: string, options?: { cause?: unknown }) {
		super(`Transfer of ${id} from ${peer} failed: ${reason}`, options);
		this.name = 'PeerTransferFailedError';
	}
}

export class OriginUnauthorizedError extends Error {
	constructor(readonly url: string, readonly status: number) {
		super(`Origin refused access to ${url} (HTTP ${status})`);
		this.name = 'OriginUnauthorizedError';
	}
}

export class OriginNotFoundError extends Error {
	constructor(readonly url: string) {
		super(`Origin has no content at ${url}`);
		this.name = 'OriginNotFoundError';
	}
}

export class IoError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'IoError';
	}
}

export class InvalidArtifactIdError extends Error {
	constructor(readonly id: string, reason: string) {
		super(`Invalid artifact id "${id}": ${reason}`);
		this.name = 'InvalidArtifactIdError';
	}
}

export class ResponseChannelClosedError extends Error {
	constructor(readonly channelId: number) {
		super(`Response channel ${channelId} is closed or unknown`);
		this.name = 'ResponseChannelClosedError';
	}
}

export class EngineStoppedError extends Error {
	constructor() {
		super('Overlay engine is stopped');
		this.name = 'EngineStoppedError';
	}
}

export const isErrnoCode = (err: unknown, code: string): boolean =>
	err instanceof Error && 'code' in err && err.code === code;
