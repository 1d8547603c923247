import { Uint8ArrayList } from 'uint8arraylist'
import { fromString as u8FromString } from 'uint8arrays/from-string'
import { toString as u8ToString } from 'uint8arrays/to-string'
import type { ArtifactId, ArtifactResponse } from '../overlay/types.js'

export const EXCHANGE_PROTOCOL_SUFFIX = '/artifact-exchange/1.0.0'

/** Largest content frame written on the exchange protocol */
export const DEFAULT_CHUNK_SIZE = 64 * 1024

export const ResponseStatus = {
	ok: 0,
	notFound: 1,
	error: 2
} as const

export class ResponseTooLargeError extends Error {
	constructor(readonly maxBytes: number) {
		super(`Response content exceeds ${maxBytes} bytes`)
		this.name = 'ResponseTooLargeError'
	}
}

export function exchangeProtocol(protocolPrefix: string): string {
	return `${protocolPrefix}${EXCHANGE_PROTOCOL_SUFFIX}`
}

/** Default protocol prefix for a named network */
export function networkPrefix(networkName: string): string {
	return `/blobswarm/${networkName}`
}

export function announcementTopic(networkName: string): string {
	return `${networkPrefix(networkName)}/artifacts/1.0.0`
}

export function encodeRequest(hash: ArtifactId): Uint8Array {
	return u8FromString(hash)
}

export function decodeRequest(frame: Uint8Array | Uint8ArrayList): ArtifactId {
	return u8ToString(frame.subarray())
}

/** Frames of a response, unprefixed: the status frame, then content in chunks of at most `chunkSize` */
export function * encodeResponse(response: ArtifactResponse, chunkSize: number = DEFAULT_CHUNK_SIZE): Generator<Uint8Array> {
	switch (response.status) {
		case 'ok': {
			yield Uint8Array.of(ResponseStatus.ok)
			const { content } = response
			for (let offset = 0; offset < content.byteLength; offset += chunkSize) {
				yield content.subarray(offset, offset + chunkSize)
			}
			return
		}
		case 'not-found':
			yield Uint8Array.of(ResponseStatus.notFound)
			return
		case 'error': {
			const message = u8FromString(response.message)
			const frame = new Uint8Array(1 + message.byteLength)
			frame[0] = ResponseStatus.error
			frame.set(message, 1)
			yield frame
		}
	}
}

/**
 * Reassemble a response from its (already length-decoded) frames. Throws {@link ResponseTooLargeError}
 * as soon as the content would exceed `maxBytes`.
 */
export async function decodeResponse(
	frames: AsyncIterable<Uint8Array | Uint8ArrayList> | Iterable<Uint8Array | Uint8ArrayList>,
	maxBytes: number = Number.POSITIVE_INFINITY
): Promise<ArtifactResponse> {
	let status: number | undefined
	let message = ''
	const content = new Uint8ArrayList()

	for await (const frame of frames) {
		if (status == null) {
			if (frame.byteLength === 0) throw new Error('Empty status frame')
			const bytes = frame.subarray()
			status = bytes[0]
			message = u8ToString(bytes.subarray(1))
			continue
		}
		if (status !== ResponseStatus.ok) throw new Error(`Unexpected content after status ${status}`)
		if (content.byteLength + frame.byteLength > maxBytes) throw new ResponseTooLargeError(maxBytes)
		content.append(frame)
	}

	switch (status) {
		case ResponseStatus.ok:
			return { status: 'ok', content: content.subarray() }
		case ResponseStatus.notFound:
			return { status: 'not-found' }
		case ResponseStatus.error:
			return { status: 'error', message }
		case undefined:
			throw new Error('Stream ended before a response arrived')
		default:
			throw new Error(`Unknown response status ${status}`)
	}
}
