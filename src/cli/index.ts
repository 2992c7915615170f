#!/usr/bin/env node
/**
 * romlibd CLI - ROM library daemon
 * Serves the game catalog over loopback IPC and offers one-shot scan,
 * list and request commands.
 */

import { resolve } from "node:path"
import { Command } from "commander"
import { loadConfig, parseConfig, type Config } from "../config.js"
import { startDaemon, type Daemon } from "../daemon.js"
import { FatalStartupError, errorMessage } from "../errors.js"
import { IPCClient } from "../ipc/client.js"
import { PROTOCOL_VERSION } from "../ipc/protocol.js"
import { LibraryStore } from "../library/store.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { defaultLibraryPath } from "../paths.js"
import { rankCounts } from "../scan/stats.js"
import { isZeroTime } from "../types.js"
import { ui } from "../ui.js"

const VERSION = PROTOCOL_VERSION

interface GlobalOptions {
	library?: string
	logFile?: string
	verbose: boolean
}

interface ServeOptions {
	port?: string
	scanPath?: string[]
	scanOnStart?: boolean
}

interface ListOptions {
	platform?: string
	category?: string
	favorites: boolean
}

interface SendOptions {
	port?: string
	id?: string
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(`log flush failed: ${errorMessage(err)}`)
	}
	process.exitCode = code
}

function parsePort(value: string | undefined, fallback: number): number {
	if (value === undefined) return fallback
	return parseConfig({ port: Number(value) }).port
}

/**
 * Merge rc file, environment and flags. Flags win.
 */
function resolveConfig(global: GlobalOptions, serve: ServeOptions = {}): Config {
	const config = loadConfig()
	return {
		...config,
		port: parsePort(serve.port, config.port),
		libraryPath: global.library ? resolve(global.library) : config.libraryPath,
		scanPaths: [...config.scanPaths, ...(serve.scanPath ?? [])],
		scanOnStart: serve.scanOnStart ?? config.scanOnStart,
	}
}

function setupLogging(global: GlobalOptions): void {
	const options = {
		...(global.logFile ? { logFilePath: resolve(global.logFile) } : {}),
		...(global.verbose ? { level: "debug" } : {}),
	}
	configureLogging(options)
}

const program = new Command()

program
	.name("romlibd")
	.version(VERSION)
	.description("ROM library daemon – serves a scanned game catalog over loopback IPC")
	.option("--library <path>", "Snapshot file (default: per-user config directory)")
	.option("--log-file <path>", "Write logs to a file instead of stdout")
	.option("--verbose", "Debug output", false)

// ─────────────────────────────────────────────────────────────────────────────
// serve
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("serve", { isDefault: true })
	.description("Run the daemon until SIGINT/SIGTERM")
	.option("-p, --port <number>", "TCP port on the loopback interface")
	.option("--scan-path <dir...>", "Register scan directories at startup")
	.option("--scan-on-start", "Rescan all directories once loaded")
	.action(async (options: ServeOptions) => {
		const global = program.opts<GlobalOptions>()
		setupLogging(global)
		const config = resolveConfig(global, options)

		let daemon: Daemon
		try {
			daemon = await startDaemon(config)
		} catch (err) {
			ui.error(errorMessage(err))
			log.cli.fatal({ error: errorMessage(err) }, "startup failed")
			await exitWithCode(err instanceof FatalStartupError ? 1 : 2)
			return
		}

		ui.banner(
			VERSION,
			daemon.server.getHost(),
			daemon.server.getPort(),
			daemon.store.path,
		)
		ui.info("Backend running. Press Ctrl+C to stop.")

		let shuttingDown = false
		const shutdown = (signal: NodeJS.Signals) => {
			if (shuttingDown) return
			shuttingDown = true
			log.cli.info({ signal }, "shutting down")
			daemon
				.shutdown()
				.then(() => {
					ui.success("Library saved, goodbye")
				})
				.catch(async (err: unknown) => {
					ui.error(`Shutdown failed: ${errorMessage(err)}`)
					await exitWithCode(1)
				})
		}
		process.once("SIGINT", shutdown)
		process.once("SIGTERM", shutdown)
	})

// ─────────────────────────────────────────────────────────────────────────────
// scan
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("scan")
	.description("Register directories, rescan the library and save it")
	.argument("[dirs...]", "Directories to add before scanning")
	.action(async (dirs: string[]) => {
		const global = program.opts<GlobalOptions>()
		setupLogging(global)
		const config = resolveConfig(global)

		try {
			const store = await LibraryStore.open({
				path: config.libraryPath ?? defaultLibraryPath(),
			})
			for (const dir of [...config.scanPaths, ...dirs]) {
				const added = await store.addScanPath(resolve(dir))
				ui.debug(`${added ? "Added" : "Already registered"}: ${dir}`, global.verbose)
			}

			ui.header("Scanning ROM Library")
			const summary = await store.scan()
			ui.success(`Found ${summary.found} games in ${summary.durationMs} ms`)
			if (summary.collisions > 0) {
				ui.warn(`${summary.collisions} files skipped because of ID collisions`)
			}
			for (const dir of summary.skippedDirs) {
				ui.warn(`Could not read ${dir}`)
			}
			ui.countTable("Platforms", rankCounts(await store.getPlatforms()))
		} catch (err) {
			ui.error(errorMessage(err))
			await exitWithCode(1)
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// list
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("list")
	.description("Print games from the saved library")
	.option("--platform <name>", "Only this platform")
	.option("--category <name>", "Only this category")
	.option("--favorites", "Only favorites", false)
	.action(async (options: ListOptions) => {
		const global = program.opts<GlobalOptions>()
		setupLogging(global)
		const config = resolveConfig(global)

		try {
			const store = await LibraryStore.open({
				path: config.libraryPath ?? defaultLibraryPath(),
			})
			const games = options.favorites
				? await store.getFavorites()
				: await store.getGames({
						platform: options.platform ?? "",
						category: options.category ?? "",
					})

			for (const game of games) {
				const star = game.favorite ? "★ " : "  "
				const played = isZeroTime(game.lastPlayed)
					? "never played"
					: `last played ${game.lastPlayed.toISOString()}`
				console.log(`${star}${game.id.padEnd(10)} ${game.platform.padEnd(6)} ${game.title} (${played})`)
			}
			ui.info(`${games.length} games`)
		} catch (err) {
			ui.error(errorMessage(err))
			await exitWithCode(1)
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// send
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("send")
	.description("Send one request to a running daemon and print the response")
	.argument("<type>", "Message type (status, list_games, get_game, ...)")
	.argument("[payload]", "JSON payload; bare words are sent as strings")
	.option("-p, --port <number>", "Daemon port")
	.option("--id <id>", "Request ID echoed back in the response")
	.action(async (type: string, payloadText: string | undefined, options: SendOptions) => {
		const global = program.opts<GlobalOptions>()
		setupLogging(global)
		const config = resolveConfig(global, options.port ? { port: options.port } : {})

		let payload: unknown
		if (payloadText !== undefined) {
			try {
				payload = JSON.parse(payloadText) as unknown
			} catch {
				payload = payloadText
			}
		}

		let client: IPCClient | null = null
		try {
			client = await IPCClient.connect({ port: config.port, host: config.host })
			const response = await client.request({
				type,
				...(options.id ? { id: options.id } : {}),
				...(payload !== undefined ? { payload } : {}),
			})
			console.log(JSON.stringify(response, null, 2))
			if (!response.success) await exitWithCode(1)
		} catch (err) {
			ui.error(errorMessage(err))
			await exitWithCode(1)
		} finally {
			await client?.close()
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

program.parseAsync().catch(async (err: unknown) => {
	ui.error(errorMessage(err))
	await exitWithCode(1)
})
