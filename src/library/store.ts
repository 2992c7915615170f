/**
 * Library store
 *
 * Owns the record sequence, scan roots, count maps and last-scan time.
 * Every operation goes through one ReadWriteLock: mutations and save/load
 * take it exclusively, queries share it. Readers get copies of records, so
 * nothing handed out can change under the lock.
 *
 * Persistence overwrites the snapshot file in place (no temp file and
 * rename). A crash mid-write can leave a truncated snapshot, and a failed
 * write after scan() leaves memory ahead of disk until the next save.
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import {
	DecodeError,
	NotADirectoryError,
	NotFoundError,
	PersistenceError,
	isErrnoException,
} from "../errors.js"
import { log } from "../logger.js"
import { DEFAULT_PLATFORM_EXTENSIONS, type PlatformTable } from "../platforms.js"
import { ReadWriteLock } from "../rwlock.js"
import { computeLibraryCounts } from "../scan/stats.js"
import {
	zeroTime,
	type CountMap,
	type GameFilter,
	type GameRecord,
	type LibraryState,
} from "../types.js"
import { scanRoots } from "./scanner.js"
import { decodeSnapshot, encodeSnapshot } from "./snapshot.js"

export const GAME_NOT_FOUND = "Game not found"

export interface LibraryStoreOptions {
	/** Snapshot file used by load(), save() and the auto-save after mutations */
	path: string
	/** Defaults to DEFAULT_PLATFORM_EXTENSIONS */
	platforms?: PlatformTable
	/** Clock for lastScan / lastPlayed */
	now?: () => Date
}

export interface ScanSummary {
	found: number
	filesVisited: number
	collisions: number
	skippedDirs: string[]
	durationMs: number
}

function emptyState(): LibraryState {
	return {
		games: [],
		scanPaths: [],
		categories: {},
		platforms: {},
		lastScan: zeroTime(),
	}
}

function cloneGame(game: GameRecord): GameRecord {
	return { ...game, lastPlayed: new Date(game.lastPlayed.getTime()) }
}

export class LibraryStore {
	readonly path: string
	readonly platforms: PlatformTable
	private readonly now: () => Date
	private readonly lock = new ReadWriteLock()
	private state: LibraryState = emptyState()

	constructor(options: LibraryStoreOptions) {
		this.path = options.path
		this.platforms = options.platforms ?? DEFAULT_PLATFORM_EXTENSIONS
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Create a store and load its snapshot, if one exists.
	 */
	static async open(options: LibraryStoreOptions): Promise<LibraryStore> {
		const store = new LibraryStore(options)
		await store.load()
		return store
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Persistence
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Replace state with the snapshot at path. Returns false when the file
	 * does not exist (state is left as is).
	 */
	async load(path: string = this.path): Promise<boolean> {
		return this.lock.withWrite(async () => {
			let text: string
			try {
				text = await readFile(path, "utf8")
			} catch (err) {
				if (isErrnoException(err) && err.code === "ENOENT") {
					log.library.debug({ path }, "no snapshot yet, starting empty")
					return false
				}
				throw new PersistenceError(path, "read", err)
			}

			const decoded = decodeSnapshot(text)
			if (!decoded.ok) {
				throw new DecodeError(path, decoded.error)
			}

			this.state = decoded.state
			log.library.info(
				{ path, games: decoded.state.games.length },
				"library loaded",
			)
			return true
		})
	}

	/**
	 * Write the full state to path, creating parent directories.
	 */
	async save(path: string = this.path): Promise<void> {
		await this.lock.withWrite(() => this.writeSnapshot(path))
	}

	/** Caller must hold the write lock. */
	private async writeSnapshot(path: string): Promise<void> {
		const text = encodeSnapshot(this.state)
		try {
			await mkdir(dirname(path), { recursive: true })
			await writeFile(path, text, "utf8")
		} catch (err) {
			throw new PersistenceError(path, "write", err)
		}
		log.library.debug({ path, bytes: text.length }, "library saved")
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Scanning
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Register a directory to scan. Returns false when the exact same string
	 * is already registered. Not persisted until the next save or scan.
	 */
	async addScanPath(path: string): Promise<boolean> {
		let isDirectory: boolean
		try {
			isDirectory = (await stat(path)).isDirectory()
		} catch (err) {
			if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
				throw new NotFoundError(`Scan path not found: ${path}`, { cause: err })
			}
			throw err
		}
		if (!isDirectory) {
			throw new NotADirectoryError(path)
		}

		return this.lock.withWrite(() => {
			if (this.state.scanPaths.includes(path)) return false
			this.state.scanPaths = [...this.state.scanPaths, path]
			log.library.info({ path }, "scan path added")
			return true
		})
	}

	/**
	 * Rebuild the library from the scan roots and persist it.
	 *
	 * The new records and counts are swapped in together before the save.
	 * If the save fails the PersistenceError propagates and the new state
	 * stays in memory.
	 */
	async scan(): Promise<ScanSummary> {
		return this.lock.withWrite(async () => {
			const started = Date.now()
			const result = await scanRoots(this.state.scanPaths, this.platforms)
			const counts = computeLibraryCounts(result.games)

			this.state = {
				...this.state,
				games: result.games,
				platforms: counts.platforms,
				categories: counts.categories,
				lastScan: this.now(),
			}

			const summary: ScanSummary = {
				found: result.games.length,
				filesVisited: result.filesVisited,
				collisions: result.collisions.length,
				skippedDirs: result.skippedDirs,
				durationMs: Date.now() - started,
			}
			log.library.info(summary, "scan complete")

			await this.writeSnapshot(this.path)
			return summary
		})
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Queries
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Records matching every non-empty filter, in sequence order.
	 */
	async getGames(filter: GameFilter = {}): Promise<GameRecord[]> {
		const platform = filter.platform ?? ""
		const category = filter.category ?? ""
		return this.lock.withRead(() =>
			this.state.games
				.filter(
					game =>
						(platform === "" || game.platform === platform) &&
						(category === "" || game.category === category),
				)
				.map(cloneGame),
		)
	}

	async getGameById(id: string): Promise<GameRecord | undefined> {
		return this.lock.withRead(() => {
			const game = this.state.games.find(g => g.id === id)
			return game ? cloneGame(game) : undefined
		})
	}

	async getFavorites(): Promise<GameRecord[]> {
		return this.lock.withRead(() =>
			this.state.games.filter(g => g.favorite).map(cloneGame),
		)
	}

	/**
	 * Records by lastPlayed, most recent first. Equal timestamps keep
	 * sequence order. limit <= 0 returns everything.
	 */
	async getRecentlyPlayed(limit = 0): Promise<GameRecord[]> {
		return this.lock.withRead(() => {
			const games = this.state.games
				.map(cloneGame)
				.sort((a, b) => b.lastPlayed.getTime() - a.lastPlayed.getTime())
			return limit > 0 && limit < games.length ? games.slice(0, limit) : games
		})
	}

	async getCategories(): Promise<CountMap> {
		return this.lock.withRead(() => ({ ...this.state.categories }))
	}

	async getPlatforms(): Promise<CountMap> {
		return this.lock.withRead(() => ({ ...this.state.platforms }))
	}

	async getScanPaths(): Promise<string[]> {
		return this.lock.withRead(() => [...this.state.scanPaths])
	}

	async getLastScan(): Promise<Date> {
		return this.lock.withRead(() => new Date(this.state.lastScan.getTime()))
	}

	async size(): Promise<number> {
		return this.lock.withRead(() => this.state.games.length)
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Mutations
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Flip a record's favorite flag and persist. Throws NotFoundError for an
	 * unknown ID.
	 */
	async toggleFavorite(id: string): Promise<GameRecord> {
		return this.mutateGame(id, game => {
			game.favorite = !game.favorite
		})
	}

	/**
	 * Mark a record as played now and persist.
	 */
	async recordPlay(id: string): Promise<GameRecord> {
		return this.mutateGame(id, game => {
			game.lastPlayed = this.now()
			game.playCount += 1
		})
	}

	private async mutateGame(
		id: string,
		mutate: (game: GameRecord) => void,
	): Promise<GameRecord> {
		return this.lock.withWrite(async () => {
			const game = this.state.games.find(g => g.id === id)
			if (!game) {
				throw new NotFoundError(GAME_NOT_FOUND)
			}
			mutate(game)
			await this.writeSnapshot(this.path)
			return cloneGame(game)
		})
	}
}
