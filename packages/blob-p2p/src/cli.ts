#!/usr/bin/env node
import { Command } from 'commander'
import { writeFile } from 'node:fs/promises'
import { ArtifactNode } from './node.js'
import type { NodeOptions } from './config.js'

type CliOptions = {
	listen?: string[]
	peer?: string[]
	bootstrap?: string
	network: string
	storagePath: string
	allocate?: string
	mdns: boolean
	privateKey?: string
}

function collect(value: string, previous: string[] = []): string[] {
	return [...previous, value]
}

function toNodeOptions(options: CliOptions): NodeOptions {
	let allocatedBytes: number | undefined
	if (options.allocate != null) {
		allocatedBytes = Number(options.allocate)
		if (!Number.isSafeInteger(allocatedBytes) || allocatedBytes <= 0) {
			throw new Error('--allocate must be a positive number of bytes')
		}
	}
	return {
		networkName: options.network,
		listen: options.listen,
		peers: options.peer,
		bootstrapNodes: options.bootstrap?.split(',').map(s => s.trim()).filter(s => s.length > 0),
		mdns: options.mdns,
		storagePath: options.storagePath,
		allocatedBytes,
		privateKey: options.privateKey
	}
}

function withNodeOptions(command: Command): Command {
	return command
		.option('-l, --listen <multiaddr>', 'Address to listen on (repeatable)', collect)
		.option('-p, --peer <multiaddr>', 'Peer to dial at start-up, ending in /p2p/<peer-id> (repeatable)', collect)
		.option('-b, --bootstrap <list>', 'Comma-separated list of bootstrap multiaddrs')
		.option('-n, --network <name>', 'Network name', 'default')
		.option('-s, --storage-path <path>', 'Artifact store directory', 'blobswarm-data')
		.option('-a, --allocate <bytes>', 'Space allocated to the artifact store in bytes')
		.option('--no-mdns', 'Disable local network discovery')
		.option('--private-key <base64>', 'Protobuf-encoded private key')
}

async function runUntilSignal(node: ArtifactNode): Promise<void> {
	await new Promise<void>((resolve) => {
		process.once('SIGINT', resolve)
		process.once('SIGTERM', resolve)
	})
	console.log('Shutting down...')
	await node.stop()
}

const program = new Command()

program
	.name('blobswarm')
	.description('Peer-to-peer cache for container registry blobs')
	.version('0.1.0')

withNodeOptions(program.command('start'))
	.description('Run a node until interrupted')
	.action(async (options: CliOptions) => {
		const node = await ArtifactNode.create(toNodeOptions(options))
		await node.start()
		console.log(`Node ${node.peerId} running`)
		console.log(JSON.stringify(await node.status(), undefined, 2))
		await runUntilSignal(node)
	})

withNodeOptions(program.command('fetch'))
	.description('Resolve one blob through the network and write it to a file')
	.argument('<name>', 'Repository name, e.g. alpine')
	.argument('<id>', 'Artifact id, e.g. sha256:<hex>')
	.requiredOption('-o, --output <file>', 'Where to write the blob')
	.action(async (name: string, id: string, options: CliOptions & { output: string }) => {
		const node = await ArtifactNode.create(toNodeOptions(options))
		await node.start()
		try {
			const content = await node.resolve(name, id)
			await writeFile(options.output, content)
			console.log(`Wrote ${content.byteLength} bytes to ${options.output}`)
		} finally {
			await node.stop()
		}
	})

program.parseAsync(process.argv).catch((error: unknown) => {
	console.error('Error:', error instanceof Error ? error.message : error)
	process.exitCode = 1
})
