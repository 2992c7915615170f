/**
 * Directory walker that turns ROM files into GameRecords
 */

import type { Dirent } from "node:fs"
import { readdir } from "node:fs/promises"
import { basename, join } from "node:path"
import { log } from "../logger.js"
import { detectPlatform, indexByExtension, type PlatformTable } from "../platforms.js"
import { cleanGameTitle, generateId } from "../romname.js"
import { DEFAULT_CATEGORY, zeroTime, type GameRecord } from "../types.js"
import { errorMessage } from "../errors.js"

export interface ScanResult {
	games: GameRecord[]
	/** Files whose ID was already taken by an earlier file in this scan */
	collisions: Array<{ id: string; path: string; keptPath: string }>
	/** Directories that could not be read */
	skippedDirs: string[]
	filesVisited: number
}

/**
 * Fresh record for a ROM file. Scan never carries anything over from an
 * earlier record with the same path.
 */
export function createGameRecord(path: string, platform: string): GameRecord {
	return {
		id: generateId(path),
		title: cleanGameTitle(basename(path)),
		description: "",
		platform,
		path,
		coverPath: "",
		lastPlayed: zeroTime(),
		playCount: 0,
		favorite: false,
		category: DEFAULT_CATEGORY,
	}
}

function compareNames(a: string, b: string): number {
	if (a === b) return 0
	return a < b ? -1 : 1
}

/**
 * Visit regular files under dir in lexical order, depth first.
 * Symlinks are not followed. Unreadable directories are reported through
 * onSkip and otherwise ignored.
 */
export async function* walkFiles(
	dir: string,
	onSkip: (dir: string, err: unknown) => void,
): AsyncGenerator<string> {
	let entries: Dirent[]
	try {
		entries = await readdir(dir, { withFileTypes: true })
	} catch (err) {
		onSkip(dir, err)
		return
	}

	entries.sort((a, b) => compareNames(a.name, b.name))
	for (const entry of entries) {
		const fullPath = join(dir, entry.name)
		if (entry.isDirectory()) {
			yield* walkFiles(fullPath, onSkip)
		} else if (entry.isFile()) {
			yield fullPath
		}
	}
}

/**
 * Walk every scan root and build the new record sequence. Roots are
 * walked in order; records come out in discovery order.
 */
export async function scanRoots(
	roots: readonly string[],
	table: PlatformTable,
): Promise<ScanResult> {
	const index = indexByExtension(table)
	const games: GameRecord[] = []
	const byId = new Map<string, string>()
	const collisions: ScanResult["collisions"] = []
	const skippedDirs: string[] = []
	let filesVisited = 0

	const onSkip = (dir: string, err: unknown) => {
		skippedDirs.push(dir)
		log.library.warn({ dir, error: errorMessage(err) }, "skipping unreadable directory")
	}

	for (const root of roots) {
		log.library.debug({ root }, "walking scan root")
		for await (const filePath of walkFiles(root, onSkip)) {
			filesVisited++
			const platform = detectPlatform(basename(filePath), index)
			if (!platform) continue

			const game = createGameRecord(filePath, platform)
			const keptPath = byId.get(game.id)
			if (keptPath !== undefined) {
				collisions.push({ id: game.id, path: filePath, keptPath })
				log.library.warn(
					{ id: game.id, path: filePath, keptPath },
					"ID collision, keeping the first file",
				)
				continue
			}
			byId.set(game.id, filePath)
			games.push(game)
		}
	}

	return { games, collisions, skippedDirs, filesVisited }
}
