import { fromString as u8FromString } from 'uint8arrays/from-string'
import { toString as u8ToString } from 'uint8arrays/to-string'
import type { Announcement } from './types.js'

/** Upper bound on hashes carried by one provide/unprovide message */
export const MAX_HASHES_PER_ANNOUNCEMENT = 256

export function encodeAnnouncement(message: Announcement): Uint8Array {
	return u8FromString(JSON.stringify(message), 'utf8')
}

/** Returns undefined for anything that is not a well-formed announcement */
export function decodeAnnouncement(data: Uint8Array): Announcement | undefined {
	let parsed: unknown
	try {
		parsed = JSON.parse(u8ToString(data, 'utf8'))
	} catch {
		return undefined
	}
	if (typeof parsed !== 'object' || parsed == null || !('type' in parsed)) return undefined

	const type = parsed.type
	if (type === 'provide' || type === 'unprovide') {
		const hashes = 'hashes' in parsed ? parsed.hashes : undefined
		if (!isStringArray(hashes) || hashes.length > MAX_HASHES_PER_ANNOUNCEMENT) return undefined
		return { type, hashes }
	}
	if (type === 'want') {
		const hash = 'hash' in parsed ? parsed.hash : undefined
		if (typeof hash !== 'string') return undefined
		return { type, hash }
	}
	return undefined
}

/** Split a hash list into announcement-sized batches */
export function batchHashes(hashes: string[]): string[][] {
	const batches: string[][] = []
	for (let i = 0; i < hashes.length; i += MAX_HASHES_PER_ANNOUNCEMENT) {
		batches.push(hashes.slice(i, i + MAX_HASHES_PER_ANNOUNCEMENT))
	}
	return batches
}

const isStringArray = (value: unknown): value is string[] =>
	Array.isArray(value) && value.every(v => typeof v === 'string')
