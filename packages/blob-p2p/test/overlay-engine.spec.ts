import { expect } from 'chai'
import {
	EngineStoppedError, PeerTimeoutError, PeerTransferFailedError, ResponseChannelClosedError
} from '@blobswarm/core'
import { toString as u8ToString } from 'uint8arrays/to-string'
import { artifact, serveInbound, TestMesh } from './helpers/mesh.js'
import { rejectionOf, waitFor } from './helpers/wait.js'

describe('OverlayEngine', () => {
	let mesh: TestMesh

	beforeEach(() => {
		mesh = new TestMesh()
	})

	afterEach(async () => {
		await mesh.stopAll()
	})

	describe('discovery', () => {
		it('lists discovered and connected peers once each', async () => {
			const a = await mesh.start('peer-a')

			a.swarm.inject({ type: 'peer-discovered', peer: 'peer-b' })
			a.swarm.inject({ type: 'peer-connected', peer: 'peer-b' })
			a.swarm.inject({ type: 'peer-connected', peer: 'peer-c' })

			await waitFor(async () => (await a.client.listPeers()).size === 2)
			expect([...await a.client.listPeers()].sort()).to.deep.equal(['peer-b', 'peer-c'])
			expect(a.swarm.addedToView).to.deep.equal(['peer-b'])
		})

		it('adds a rediscovered peer to the partial view only once', async () => {
			const a = await mesh.start('peer-a')

			a.swarm.inject({ type: 'peer-discovered', peer: 'peer-b' })
			a.swarm.inject({ type: 'peer-discovered', peer: 'peer-b' })

			await waitFor(async () => (await a.client.listPeers()).has('peer-b'))
			expect(a.swarm.addedToView).to.deep.equal(['peer-b'])
		})

		it('ignores discovery of itself', async () => {
			const a = await mesh.start('peer-a')

			a.swarm.inject({ type: 'peer-discovered', peer: 'peer-a' })
			a.swarm.inject({ type: 'peer-discovered', peer: 'peer-b' })

			await waitFor(async () => (await a.client.listPeers()).has('peer-b'))
			expect([...await a.client.listPeers()]).to.deep.equal(['peer-b'])
		})

		it('expires discovered peers that are not re-announced unless connected', async () => {
			const a = await mesh.start('peer-a', { discoveryTtlMs: 30, sweepIntervalMs: 10 })

			a.swarm.inject({ type: 'peer-discovered', peer: 'peer-b' })
			a.swarm.inject({ type: 'peer-discovered', peer: 'peer-c' })
			a.swarm.inject({ type: 'peer-connected', peer: 'peer-c' })

			await waitFor(() => a.swarm.removedFromView.includes('peer-b'))
			expect(a.swarm.removedFromView).to.deep.equal(['peer-b'])
			expect([...await a.client.listPeers()]).to.deep.equal(['peer-c'])
		})

		it('drops disconnected peers that were never discovered', async () => {
			const a = await mesh.start('peer-a')

			a.swarm.inject({ type: 'peer-connected', peer: 'peer-b' })
			a.swarm.inject({ type: 'peer-disconnected', peer: 'peer-b' })
			a.swarm.inject({ type: 'peer-connected', peer: 'peer-c' })

			await waitFor(async () => (await a.client.listPeers()).has('peer-c'))
			expect([...await a.client.listPeers()]).to.deep.equal(['peer-c'])
		})
	})

	describe('providers', () => {
		it('includes itself when it provides the artifact', async () => {
			const a = await mesh.start('peer-a')
			const layer = artifact('layer')

			await a.client.provide(layer.hash)

			expect([...await a.client.listProviders(layer.hash)]).to.deep.equal(['peer-a'])
			expect(a.swarm.published).to.deep.equal([{ type: 'provide', hashes: [layer.id] }])
		})

		it('learns remote providers from announcements', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')

			await a.client.provide(layer.hash)

			expect([...await b.client.listProviders(layer.hash)]).to.deep.equal(['peer-a'])
		})

		it('asks the network when no provider is known and takes the first answer', async () => {
			const a = await mesh.start('peer-a')
			const layer = artifact('layer')
			await a.client.provide(layer.hash)
			const b = await mesh.start('peer-b', { providerQueryMs: 1000 })

			const providers = await b.client.listProviders(layer.hash)

			expect([...providers]).to.deep.equal(['peer-a'])
			expect(b.swarm.published).to.deep.equal([{ type: 'want', hash: layer.id }])
			expect(a.swarm.published).to.deep.equal([
				{ type: 'provide', hashes: [layer.id] },
				{ type: 'provide', hashes: [layer.id] }
			])
		})

		it('returns an empty set once the provider query expires', async () => {
			const a = await mesh.start('peer-a')

			const providers = await a.client.listProviders(artifact('nobody has this').hash)

			expect(providers.size).to.equal(0)
		})

		it('forgets a provider that stops providing', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')
			await a.client.provide(layer.hash)
			await waitFor(async () => (await b.client.listProviders(layer.hash)).has('peer-a'))

			await a.client.stopProviding(layer.hash)

			await waitFor(async () => (await b.client.listProviders(layer.hash)).size === 0)
			expect(a.swarm.published.at(-1)).to.deep.equal({ type: 'unprovide', hashes: [layer.id] })
		})

		it('expires provider records that are not refreshed', async () => {
			const a = await mesh.start('peer-a', { providerTtlMs: 60, providerQueryMs: 0, sweepIntervalMs: 10 })
			const layer = artifact('layer')

			a.swarm.inject({ type: 'announcement', from: 'peer-x', message: { type: 'provide', hashes: [layer.id] } })

			await waitFor(async () => (await a.client.listProviders(layer.hash)).has('peer-x'))
			await waitFor(async () => (await a.client.listProviders(layer.hash)).size === 0)
		})

		it('re-announces what it provides on the sweep', async () => {
			const a = await mesh.start('peer-a', { reprovideIntervalMs: 20, sweepIntervalMs: 10 })
			const layer = artifact('layer')

			await a.client.provide(layer.hash)

			await waitFor(() => a.swarm.published.length >= 2)
			expect(a.swarm.published[1]).to.deep.equal({ type: 'provide', hashes: [layer.id] })
		})
	})

	describe('requests', () => {
		it('transfers artifact content from a peer', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer-content')
			const serving = serveInbound(a, () => ({ status: 'ok', content: layer.content }))

			const content = await b.client.requestArtifact('peer-a', layer.hash)

			expect(u8ToString(content)).to.equal('layer-content')
			expect(b.engine.pendingRequestCount).to.equal(0)
			await mesh.stopAll()
			await serving
		})

		it('surfaces the requesting peer and identifier to the serving application', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')
			const inbound = a.engine.inbound[Symbol.asyncIterator]()

			const pending = b.client.requestArtifact('peer-a', layer.hash)
			const next = await inbound.next()
			if (next.done === true) throw new Error('inbound stream ended')

			expect(next.value.peer).to.equal('peer-b')
			expect(next.value.hash).to.equal(layer.id)
			await a.client.respondArtifact(next.value.channelId, { status: 'ok', content: layer.content })
			expect(u8ToString(await pending)).to.equal('layer')
		})

		it('rejects with a transfer failure when the peer does not hold the artifact', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')
			const serving = serveInbound(a, () => ({ status: 'not-found' }))

			const err = await rejectionOf(b.client.requestArtifact('peer-a', layer.hash))

			expect(err).to.be.instanceOf(PeerTransferFailedError)
			expect(err).to.have.property('message', `Transfer of ${layer.id} from peer-a failed: peer does not hold the artifact`)
			await mesh.stopAll()
			await serving
		})

		it('fails a transfer that exceeds the byte limit', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer-content')
			const serving = serveInbound(a, () => ({ status: 'ok', content: layer.content }))

			const err = await rejectionOf(b.client.requestArtifact('peer-a', layer.hash, { maxBytes: 4 }))

			expect(err).to.be.instanceOf(PeerTransferFailedError)
			expect(err).to.have.property('message', `Transfer of ${layer.id} from peer-a failed: Response content exceeds 4 bytes`)
			expect(u8ToString(await b.client.requestArtifact('peer-a', layer.hash, { maxBytes: 13 }))).to.equal('layer-content')
			await mesh.stopAll()
			await serving
		})

		it('rejects with a transfer failure when the peer cannot be reached', async () => {
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')

			const err = await rejectionOf(b.client.requestArtifact('peer-gone', layer.hash))

			expect(err).to.be.instanceOf(PeerTransferFailedError)
			expect(err).to.have.property('message', `Transfer of ${layer.id} from peer-gone failed: unknown peer peer-gone`)
			expect(b.engine.pendingRequestCount).to.equal(0)
		})

		it('times out a silent peer and releases the pending request', async () => {
			mesh.network.swarm('peer-silent')
			const b = await mesh.start('peer-b', { requestTimeoutMs: 50 })
			const layer = artifact('layer')

			const err = await rejectionOf(b.client.requestArtifact('peer-silent', layer.hash))

			expect(err).to.be.instanceOf(PeerTimeoutError)
			expect(err).to.have.property('timeoutMs', 50)
			expect(b.engine.pendingRequestCount).to.equal(0)
		})

		it('answers requests the application leaves open with an error', async () => {
			await mesh.start('peer-a', { inboundTimeoutMs: 50 })
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')

			const err = await rejectionOf(b.client.requestArtifact('peer-a', layer.hash))

			expect(err).to.be.instanceOf(PeerTransferFailedError)
			expect(err).to.have.property('message', `Transfer of ${layer.id} from peer-a failed: no response from application`)
		})

		it('accepts exactly one response per channel', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')
			const inbound = a.engine.inbound[Symbol.asyncIterator]()

			const pending = b.client.requestArtifact('peer-a', layer.hash)
			const next = await inbound.next()
			if (next.done === true) throw new Error('inbound stream ended')
			const { channelId } = next.value

			await a.client.respondArtifact(channelId, { status: 'ok', content: layer.content })
			await pending
			const err = await rejectionOf(a.client.respondArtifact(channelId, { status: 'not-found' }))

			expect(err).to.be.instanceOf(ResponseChannelClosedError)
			expect(err).to.have.property('channelId', channelId)
		})

		it('rejects responses on unknown channels', async () => {
			const a = await mesh.start('peer-a')

			const err = await rejectionOf(a.client.respondArtifact(999, { status: 'not-found' }))

			expect(err).to.be.instanceOf(ResponseChannelClosedError)
		})

		it('serves concurrent requests from cloned clients', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layers = ['one', 'two', 'three', 'four', 'five'].map(artifact)
			const byId = new Map(layers.map(layer => [layer.id, layer.content]))
			const serving = serveInbound(a, ({ hash }) => {
				const content = byId.get(hash)
				return content != null ? { status: 'ok', content } : { status: 'not-found' }
			})

			const results = await Promise.all(layers.map(async layer => await b.client.clone().requestArtifact('peer-a', layer.hash)))

			expect(results.map(content => u8ToString(content))).to.deep.equal(['one', 'two', 'three', 'four', 'five'])
			expect(b.engine.pendingRequestCount).to.equal(0)
			await mesh.stopAll()
			await serving
		})
	})

	describe('connections', () => {
		it('lets listen and dial through to the swarm', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')

			await a.client.listen('/ip4/127.0.0.1/tcp/44000')
			await b.client.dial('peer-a', '/ip4/127.0.0.1/tcp/44000')

			expect(a.swarm.listening).to.deep.equal(['/ip4/127.0.0.1/tcp/44000'])
			await waitFor(async () => (await a.client.listPeers()).has('peer-b'))
			await waitFor(async () => (await b.client.listPeers()).has('peer-a'))
			expect(await rejectionOf(b.client.dial('peer-z', '/ip4/127.0.0.1/tcp/1'))).to.have.property('message', 'connection to /ip4/127.0.0.1/tcp/1 refused')
		})
	})

	describe('stop', () => {
		it('rejects outstanding and later commands', async () => {
			mesh.network.swarm('peer-silent')
			const b = await mesh.start('peer-b')
			const pending = b.client.requestArtifact('peer-silent', artifact('layer').hash)
			await waitFor(() => b.engine.pendingRequestCount === 1)

			await b.engine.stop()

			expect(await rejectionOf(pending)).to.be.instanceOf(EngineStoppedError)
			expect(await rejectionOf(b.client.listPeers())).to.be.instanceOf(EngineStoppedError)
			expect(b.engine.pendingRequestCount).to.equal(0)
		})

		it('answers open inbound channels with an error', async () => {
			const a = await mesh.start('peer-a')
			const b = await mesh.start('peer-b')
			const layer = artifact('layer')
			const inbound = a.engine.inbound[Symbol.asyncIterator]()

			const pending = b.client.requestArtifact('peer-a', layer.hash)
			await inbound.next()
			await a.engine.stop()

			const err = await rejectionOf(pending)
			expect(err).to.be.instanceOf(PeerTransferFailedError)
			expect(err).to.have.property('message', `Transfer of ${layer.id} from peer-a failed: node is shutting down`)
		})
	})
})
