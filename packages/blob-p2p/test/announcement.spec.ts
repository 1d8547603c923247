import { expect } from 'chai'
import { fromString as u8FromString } from 'uint8arrays/from-string'
import {
	batchHashes, decodeAnnouncement, encodeAnnouncement, MAX_HASHES_PER_ANNOUNCEMENT
} from '../src/overlay/announcement.js'

const json = (text: string): Uint8Array => u8FromString(text, 'utf8')

describe('announcements', () => {
	it('encodes as JSON', () => {
		const encoded = encodeAnnouncement({ type: 'want', hash: 'sha256:ab' })

		expect(new TextDecoder().decode(encoded)).to.equal('{"type":"want","hash":"sha256:ab"}')
	})

	it('decodes provide, unprovide and want messages', () => {
		expect(decodeAnnouncement(json('{"type":"provide","hashes":["sha256:01","sha256:02"]}')))
			.to.deep.equal({ type: 'provide', hashes: ['sha256:01', 'sha256:02'] })
		expect(decodeAnnouncement(json('{"type":"unprovide","hashes":[]}')))
			.to.deep.equal({ type: 'unprovide', hashes: [] })
		expect(decodeAnnouncement(json('{"type":"want","hash":"sha256:03","extra":1}')))
			.to.deep.equal({ type: 'want', hash: 'sha256:03' })
	})

	it('rejects malformed messages', () => {
		const malformed = [
			'not json',
			'null',
			'"provide"',
			'{"hashes":["sha256:01"]}',
			'{"type":"provide"}',
			'{"type":"provide","hashes":[1]}',
			'{"type":"want","hash":7}',
			'{"type":"forget","hash":"sha256:01"}'
		]
		for (const text of malformed) {
			expect(decodeAnnouncement(json(text)), text).to.equal(undefined)
		}
	})

	it('rejects oversized provide lists', () => {
		const hashes = Array.from({ length: MAX_HASHES_PER_ANNOUNCEMENT + 1 }, (_, i) => `sha256:${i}`)

		expect(decodeAnnouncement(encodeAnnouncement({ type: 'provide', hashes }))).to.equal(undefined)
	})

	it('batches hash lists to the announcement limit', () => {
		const hashes = Array.from({ length: 600 }, (_, i) => `sha256:${i}`)

		const batches = batchHashes(hashes)

		expect(batches.map(batch => batch.length)).to.deep.equal([256, 256, 88])
		expect(batches.flat()).to.deep.equal(hashes)
		expect(batchHashes([])).to.deep.equal([])
	})
})
