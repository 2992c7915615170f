/**
 * Daemon wiring: library store + request router + IPC server
 */

import { resolve } from "node:path"
import type { Config } from "./config.js"
import { errorMessage } from "./errors.js"
import { IPCServer } from "./ipc/server.js"
import { RequestRouter } from "./ipc/router.js"
import { LibraryStore } from "./library/store.js"
import { log } from "./logger.js"
import { defaultLibraryPath } from "./paths.js"
import type { PlatformTable } from "./platforms.js"

export interface Daemon {
	store: LibraryStore
	router: RequestRouter
	server: IPCServer
	/** Stop the server, then save the library. */
	shutdown(): Promise<void>
}

export interface StartDaemonOptions {
	platforms?: PlatformTable
}

/**
 * Load the library, register configured scan paths, optionally rescan,
 * then start listening. Any failure here aborts startup.
 */
export async function startDaemon(
	config: Config,
	options: StartDaemonOptions = {},
): Promise<Daemon> {
	const libraryPath = config.libraryPath ?? defaultLibraryPath()
	const store = await LibraryStore.open(
		options.platforms
			? { path: libraryPath, platforms: options.platforms }
			: { path: libraryPath },
	)

	for (const scanPath of config.scanPaths) {
		await store.addScanPath(resolve(scanPath))
	}

	if (config.scanOnStart) {
		const summary = await store.scan()
		log.library.info({ found: summary.found }, "startup scan finished")
	}

	const router = new RequestRouter(store)
	const server = new IPCServer({ port: config.port, host: config.host })
	server.setHandler(router.handler)
	await server.start()

	return {
		store,
		router,
		server,
		async shutdown() {
			await server.stop()
			try {
				await store.save()
			} catch (err) {
				log.library.error({ error: errorMessage(err) }, "final save failed")
				throw err
			}
		},
	}
}
