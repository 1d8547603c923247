/** Upstream registry consulted when neither the local store nor any peer holds an artifact */
export interface IOriginRegistry {
	/** Obtain a pull token for repository `name` */
	authenticate(name: string): Promise<string>
	/** Stream the blob's bytes. The content is unverified; callers hash it. */
	fetchBlob(name: string, id: string, token: string): Promise<AsyncIterable<Uint8Array>>
}
