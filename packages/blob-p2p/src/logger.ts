import debug from 'debug'

const BASE_NAMESPACE = 'blobswarm:p2p'

export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`)
}
