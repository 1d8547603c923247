import { expect } from 'chai'
import { decode as lpDecode, encode as lpEncode } from 'it-length-prefixed'
import { Uint8ArrayList } from 'uint8arraylist'
import { toString as u8ToString } from 'uint8arrays/to-string'
import {
	ResponseTooLargeError, announcementTopic, decodeRequest, decodeResponse, encodeRequest, encodeResponse, exchangeProtocol, networkPrefix
} from '../src/exchange/protocol.js'
import { bytes } from './helpers/mesh.js'
import { rejectionOf } from './helpers/wait.js'

describe('exchange protocol', () => {
	it('names the protocol and topic after the network', () => {
		expect(exchangeProtocol(networkPrefix('lab'))).to.equal('/blobswarm/lab/artifact-exchange/1.0.0')
		expect(announcementTopic('lab')).to.equal('/blobswarm/lab/artifacts/1.0.0')
	})

	it('carries the identifier as one UTF-8 frame', () => {
		expect(decodeRequest(encodeRequest('sha256:abcd'))).to.equal('sha256:abcd')
		expect(decodeRequest(new Uint8ArrayList(bytes('sha256:'), bytes('ef')))).to.equal('sha256:ef')
	})

	it('frames content behind an ok status in bounded chunks', () => {
		const frames = [...encodeResponse({ status: 'ok', content: bytes('abcdefg') }, 3)]

		expect(frames.map(frame => [...frame])).to.deep.equal([
			[0],
			[...bytes('abc')],
			[...bytes('def')],
			[...bytes('g')]
		])
	})

	it('encodes not-found and error as a single status frame', () => {
		expect([...encodeResponse({ status: 'not-found' })].map(frame => [...frame])).to.deep.equal([[1]])

		const [error, ...rest] = [...encodeResponse({ status: 'error', message: 'busy' })]
		expect(rest).to.have.length(0)
		expect(error?.[0]).to.equal(2)
		expect(u8ToString(error?.subarray(1) ?? new Uint8Array())).to.equal('busy')
	})

	it('reassembles responses from length-prefixed frames', async () => {
		const wire = new Uint8ArrayList(...lpEncode(encodeResponse({ status: 'ok', content: bytes('hello world') }, 4)))

		const response = await decodeResponse(lpDecode([wire.subarray()]))

		expect(response.status).to.equal('ok')
		expect(response.status === 'ok' ? u8ToString(response.content) : undefined).to.equal('hello world')
	})

	it('reassembles empty content', async () => {
		const response = await decodeResponse(encodeResponse({ status: 'ok', content: new Uint8Array() }))

		expect(response.status === 'ok' ? response.content.byteLength : -1).to.equal(0)
	})

	it('decodes not-found and error responses', async () => {
		expect(await decodeResponse(encodeResponse({ status: 'not-found' }))).to.deep.equal({ status: 'not-found' })
		expect(await decodeResponse(encodeResponse({ status: 'error', message: 'disk failure' })))
			.to.deep.equal({ status: 'error', message: 'disk failure' })
	})

	it('stops reading content once it exceeds the byte limit', async () => {
		let pulled = 0
		function * frames(): Generator<Uint8Array> {
			for (const frame of encodeResponse({ status: 'ok', content: bytes('abcdefghij') }, 4)) {
				pulled++
				yield frame
			}
		}

		const err = await rejectionOf(decodeResponse(frames(), 6))

		expect(err).to.be.instanceOf(ResponseTooLargeError)
		expect(err).to.have.property('message', 'Response content exceeds 6 bytes')
		expect(pulled).to.equal(3)
	})

	it('accepts content that fills the byte limit exactly', async () => {
		const response = await decodeResponse(encodeResponse({ status: 'ok', content: bytes('abcdefghij') }, 4), 10)

		expect(response.status).to.equal('ok')
		expect(response.status === 'ok' ? u8ToString(response.content) : undefined).to.equal('abcdefghij')
	})

	it('rejects truncated and unknown responses', async () => {
		expect(await rejectionOf(decodeResponse([]))).to.have.property('message', 'Stream ended before a response arrived')
		expect(await rejectionOf(decodeResponse([Uint8Array.of(9)]))).to.have.property('message', 'Unknown response status 9')
		expect(await rejectionOf(decodeResponse([Uint8Array.of(1), bytes('x')]))).to.have.property('message', 'Unexpected content after status 1')
		expect(await rejectionOf(decodeResponse([new Uint8Array()]))).to.have.property('message', 'Empty status frame')
	})
})
