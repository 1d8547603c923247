import { IoError, OriginNotFoundError, OriginUnauthorizedError } from '@blobswarm/core'
import { createLogger } from '../logger.js'
import type { IOriginRegistry } from './i-origin-registry.js'

const log = createLogger('origin:docker-hub')

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export type DockerHubRegistryInit = {
	authUrl?: string
	registryUrl?: string
	service?: string
	/** Repository namespace; official images live under `library` */
	namespace?: string
	clientId?: string
	/** Lifetime assumed when the token response omits `expires_in` */
	defaultTokenTtlSeconds?: number
	/** Tokens are dropped this long before they expire */
	tokenExpiryMarginSeconds?: number
	fetch?: FetchFn
}

interface CachedToken {
	token: string
	expiresAt: number
}

/** Docker Registry v2 origin: anonymous pull tokens from the auth service, blobs from the registry */
export class DockerHubRegistry implements IOriginRegistry {
	private readonly authUrl: string
	private readonly registryUrl: string
	private readonly service: string
	private readonly namespace: string
	private readonly clientId: string
	private readonly defaultTtl: number
	private readonly margin: number
	private readonly fetch: FetchFn
	private readonly tokens = new Map<string, CachedToken>()

	constructor(init: DockerHubRegistryInit = {}) {
		this.authUrl = init.authUrl ?? 'https://auth.docker.io/token'
		this.registryUrl = init.registryUrl ?? 'https://registry-1.docker.io'
		this.service = init.service ?? 'registry.docker.io'
		this.namespace = init.namespace ?? 'library'
		this.clientId = init.clientId ?? 'blobswarm'
		this.defaultTtl = init.defaultTokenTtlSeconds ?? 60
		this.margin = init.tokenExpiryMarginSeconds ?? 10
		this.fetch = init.fetch ?? ((url, requestInit) => fetch(url, requestInit))
	}

	async authenticate(name: string): Promise<string> {
		const cached = this.tokens.get(name)
		if (cached != null && cached.expiresAt > Date.now()) {
			return cached.token
		}

		const url = `${this.authUrl}?client_id=${encodeURIComponent(this.clientId)}`
			+ `&service=${encodeURIComponent(this.service)}`
			+ `&scope=repository:${this.namespace}/${name}:pull`
		const response = await this.get(url)
		const body: unknown = await response.json().catch(err => {
			throw new IoError(`Token response from ${url} is not JSON`, { cause: err })
		})
		if (typeof body !== 'object' || body == null || !('token' in body) || typeof body.token !== 'string') {
			throw new IoError(`Token response from ${url} carries no token`)
		}
		const token = body.token
		const expiresIn = 'expires_in' in body && typeof body.expires_in === 'number' ? body.expires_in : this.defaultTtl

		const lifetime = Math.max(0, expiresIn - this.margin) * 1000
		this.tokens.set(name, { token, expiresAt: Date.now() + lifetime })
		log('token for %s valid for %ds', name, expiresIn)
		return token
	}

	async fetchBlob(name: string, id: string, token: string): Promise<AsyncIterable<Uint8Array>> {
		const url = `${this.registryUrl}/v2/${this.namespace}/${name}/blobs/${id}`
		const response = await this.get(url, { headers: { Authorization: `Bearer ${token}` } })
		const body = response.body
		if (body == null) {
			throw new IoError(`Origin returned no body for ${url}`)
		}
		log('fetching %s', url)
		return readBody(body, url)
	}

	private async get(url: string, init?: RequestInit): Promise<Response> {
		const response = await this.fetch(url, { ...init, method: 'GET', redirect: 'follow' }).catch(err => {
			throw new IoError(`Request to ${url} failed`, { cause: err })
		})
		if (response.ok) {
			return response
		}
		switch (response.status) {
			case 401:
			case 403:
				throw new OriginUnauthorizedError(url, response.status)
			case 404:
				throw new OriginNotFoundError(url)
			default:
				throw new IoError(`Origin answered ${response.status} for ${url}`)
		}
	}
}

async function * readBody(body: ReadableStream<Uint8Array>, url: string): AsyncGenerator<Uint8Array> {
	const reader = body.getReader()
	let finished = false
	try {
		while (true) {
			const result = await reader.read().catch(err => {
				throw new IoError(`Reading body of ${url} failed`, { cause: err })
			})
			if (result.done) {
				finished = true
				return
			}
			yield result.value
		}
	} finally {
		if (!finished) {
			await reader.cancel().catch(err => { log('cancelling body of %s failed - %o', url, err) })
		}
		reader.releaseLock()
	}
}
