import { describe, it, expect } from "vitest"
import { readFile, rm, writeFile } from "node:fs/promises"
import { extname, join } from "node:path"
import {
	DecodeError,
	NotADirectoryError,
	NotFoundError,
	PersistenceError,
} from "../src/errors.js"
import { decodeSnapshot } from "../src/library/snapshot.js"
import { LibraryStore } from "../src/library/store.js"
import { DEFAULT_PLATFORM_EXTENSIONS } from "../src/platforms.js"
import { generateId } from "../src/romname.js"
import { isZeroTime } from "../src/types.js"
import { withTempDir, writeFiles } from "./helpers/index.js"

/** Store with a hand-driven clock */
function createStore(dir: string, start = Date.parse("2026-05-01T10:00:00.000Z")) {
	let clock = start
	const store = new LibraryStore({
		path: join(dir, "config", "library.json"),
		now: () => new Date(clock),
	})
	return {
		store,
		setClock(iso: string) {
			clock = Date.parse(iso)
		},
	}
}

async function seedRoms(root: string): Promise<void> {
	await writeFiles(root, [
		"nes/Contra.nes",
		"nes/cover.png",
		"snes/Super_Metroid (USA).SFC",
		"gba/sub/deep/Golden Sun.gba",
		"notes.txt",
	])
}

describe("LibraryStore", () => {
	// ─────────────────────────────────────────────────────────────────────────
	// Scan paths
	// ─────────────────────────────────────────────────────────────────────────

	describe("addScanPath", () => {
		it("is idempotent for the exact same string", async () => {
			await withTempDir(async dir => {
				const { store } = createStore(dir)
				expect(await store.addScanPath(dir)).toBe(true)
				expect(await store.addScanPath(dir)).toBe(false)
				expect(await store.addScanPath(dir)).toBe(false)
				expect(await store.getScanPaths()).toEqual([dir])
			})
		})

		it("rejects a missing path with NotFoundError", async () => {
			await withTempDir(async dir => {
				const { store } = createStore(dir)
				const missing = join(dir, "missing")
				await expect(store.addScanPath(missing)).rejects.toBeInstanceOf(NotFoundError)
				expect(await store.getScanPaths()).toEqual([])
			})
		})

		it("rejects a regular file with NotADirectoryError", async () => {
			await withTempDir(async dir => {
				const { store } = createStore(dir)
				const [file] = await writeFiles(dir, ["game.nes"])
				await expect(store.addScanPath(file ?? "")).rejects.toBeInstanceOf(
					NotADirectoryError,
				)
			})
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Scanning
	// ─────────────────────────────────────────────────────────────────────────

	describe("scan", () => {
		it("builds records for mapped extensions only, in lexical walk order", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				await seedRoms(root)
				const { store } = createStore(dir)
				await store.addScanPath(root)

				const summary = await store.scan()
				expect(summary.found).toBe(3)
				expect(summary.filesVisited).toBe(5)
				expect(summary.collisions).toBe(0)

				const games = await store.getGames()
				expect(games.map(g => [g.title, g.platform])).toEqual([
					["Golden Sun", "GBA"],
					["Contra", "NES"],
					["Super Metroid", "SNES"],
				])

				for (const game of games) {
					const ext = extname(game.path).toLowerCase()
					expect(DEFAULT_PLATFORM_EXTENSIONS[game.platform]).toContain(ext)
					expect(game.id).toBe(generateId(game.path))
					expect(game.category).toBe("Uncategorized")
					expect(game.favorite).toBe(false)
					expect(game.playCount).toBe(0)
					expect(isZeroTime(game.lastPlayed)).toBe(true)
				}

				expect(await store.getPlatforms()).toEqual({ GBA: 1, NES: 1, SNES: 1 })
				expect(await store.getCategories()).toEqual({ Uncategorized: 3 })
				expect((await store.getLastScan()).toISOString()).toBe(
					"2026-05-01T10:00:00.000Z",
				)
			})
		})

		it("persists the new state", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				await seedRoms(root)
				const { store } = createStore(dir)
				await store.addScanPath(root)
				await store.scan()

				const decoded = decodeSnapshot(await readFile(store.path, "utf8"))
				if (!decoded.ok) throw new Error(decoded.error)
				expect(decoded.state.games).toHaveLength(3)
				expect(decoded.state.scanPaths).toEqual([root])
				expect(decoded.state.platforms).toEqual({ GBA: 1, NES: 1, SNES: 1 })
			})
		})

		it("discards favorites and play history on rescan", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				await seedRoms(root)
				const { store } = createStore(dir)
				await store.addScanPath(root)
				await store.scan()

				const [first] = await store.getGames()
				const id = first?.id ?? ""
				await store.toggleFavorite(id)
				await store.recordPlay(id)
				expect((await store.getGameById(id))?.favorite).toBe(true)

				await store.scan()
				const rescanned = await store.getGameById(id)
				expect(rescanned?.favorite).toBe(false)
				expect(rescanned?.playCount).toBe(0)
				expect(await store.getFavorites()).toEqual([])
			})
		})

		it("skips a scan root that disappeared", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				await seedRoms(root)
				const { store } = createStore(dir)
				await store.addScanPath(root)
				await writeFiles(dir, ["gone/Kirby.gb"])
				await store.addScanPath(join(dir, "gone"))
				await rm(join(dir, "gone"), { recursive: true })

				const summary = await store.scan()
				expect(summary.found).toBe(3)
				expect(summary.skippedDirs).toEqual([join(dir, "gone")])
			})
		})

		it("keeps the first file when two paths derive the same ID", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				// 27 directory names guarantee two suffixes agree mod 26
				const seen = new Map<string, string>()
				let pair: [string, string] | null = null
				for (let i = 10; i < 37 && !pair; i++) {
					const name = `d${i}`
					const id = generateId(join(root, name, "Zelda.nes"))
					const earlier = seen.get(id)
					if (earlier) pair = [earlier, name]
					seen.set(id, name)
				}
				expect(pair).not.toBeNull()
				if (!pair) return
				const [firstDir, secondDir] = pair

				await writeFiles(root, [`${firstDir}/Zelda.nes`, `${secondDir}/Zelda.nes`])
				const { store } = createStore(dir)
				await store.addScanPath(root)

				const summary = await store.scan()
				expect(summary.found).toBe(1)
				expect(summary.collisions).toBe(1)
				const games = await store.getGames()
				expect(games.map(g => g.path)).toEqual([join(root, firstDir, "Zelda.nes")])
			})
		})

		it("keeps the new state in memory when saving fails", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				await seedRoms(root)
				// Parent of the snapshot is a file, so mkdir fails
				await writeFile(join(dir, "blocker"), "x")
				const store = new LibraryStore({ path: join(dir, "blocker", "library.json") })
				await store.addScanPath(root)

				await expect(store.scan()).rejects.toBeInstanceOf(PersistenceError)
				expect(await store.size()).toBe(3)
				expect(await store.getPlatforms()).toEqual({ GBA: 1, NES: 1, SNES: 1 })
			})
		})

		it("makes readers queued during a scan see only the new state", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				await seedRoms(root)
				const { store } = createStore(dir)
				await store.addScanPath(root)

				const scanning = store.scan()
				const reading = store.getGames()
				const [summary, games] = await Promise.all([scanning, reading])
				expect(games).toHaveLength(summary.found)
			})
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Queries and mutations
	// ─────────────────────────────────────────────────────────────────────────

	describe("queries", () => {
		async function scanned(dir: string) {
			const root = join(dir, "roms")
			await writeFiles(root, [
				"a/Alpha.nes",
				"b/Beta.gba",
				"c/Gamma.nes",
				"d/Delta.gb",
			])
			const ctx = createStore(dir)
			await ctx.store.addScanPath(root)
			await ctx.store.scan()
			const ids = (await ctx.store.getGames()).map(g => g.id)
			return { ...ctx, ids }
		}

		it("filters by platform and category, keeping order", async () => {
			await withTempDir(async dir => {
				const { store } = await scanned(dir)
				const nes = await store.getGames({ platform: "NES" })
				expect(nes.map(g => g.title)).toEqual(["Alpha", "Gamma"])

				expect(await store.getGames({ category: "Uncategorized" })).toHaveLength(4)
				expect(await store.getGames({ platform: "NES", category: "Other" })).toEqual([])
				expect(await store.getGames({ platform: "", category: "" })).toHaveLength(4)
			})
		})

		it("returns copies that do not leak into the store", async () => {
			await withTempDir(async dir => {
				const { store, ids } = await scanned(dir)
				const [game] = await store.getGames()
				if (!game) throw new Error("expected a game")
				game.favorite = true
				game.title = "changed"
				const fresh = await store.getGameById(ids[0] ?? "")
				expect(fresh?.favorite).toBe(false)
				expect(fresh?.title).toBe("Alpha")
			})
		})

		it("returns undefined for an unknown ID", async () => {
			await withTempDir(async dir => {
				const { store } = await scanned(dir)
				expect(await store.getGameById("NOPE")).toBeUndefined()
			})
		})

		it("toggleFavorite is self-inverse and persists", async () => {
			await withTempDir(async dir => {
				const { store, ids } = await scanned(dir)
				const id = ids[1] ?? ""

				const on = await store.toggleFavorite(id)
				expect(on.favorite).toBe(true)
				expect((await store.getFavorites()).map(g => g.id)).toEqual([id])

				const reloaded = new LibraryStore({ path: store.path })
				await reloaded.load()
				expect((await reloaded.getGameById(id))?.favorite).toBe(true)

				const off = await store.toggleFavorite(id)
				expect(off.favorite).toBe(false)
				expect(await store.getFavorites()).toEqual([])
			})
		})

		it("toggleFavorite rejects an unknown ID", async () => {
			await withTempDir(async dir => {
				const { store } = await scanned(dir)
				await expect(store.toggleFavorite("NOPE")).rejects.toThrow(
					new NotFoundError("Game not found"),
				)
			})
		})

		it("recordPlay stamps the clock and counts plays", async () => {
			await withTempDir(async dir => {
				const { store, ids, setClock } = await scanned(dir)
				const id = ids[2] ?? ""
				setClock("2026-05-03T20:00:00.000Z")
				await store.recordPlay(id)
				setClock("2026-05-04T21:00:00.000Z")
				const game = await store.recordPlay(id)
				expect(game.playCount).toBe(2)
				expect(game.lastPlayed.toISOString()).toBe("2026-05-04T21:00:00.000Z")
				await expect(store.recordPlay("NOPE")).rejects.toBeInstanceOf(NotFoundError)
			})
		})

		it("orders recently played by lastPlayed, ties in sequence order", async () => {
			await withTempDir(async dir => {
				const { store, ids, setClock } = await scanned(dir)
				const [alpha, beta, gamma, delta] = ids
				setClock("2026-05-02T09:00:00.000Z")
				await store.recordPlay(gamma ?? "")
				setClock("2026-05-05T09:00:00.000Z")
				await store.recordPlay(alpha ?? "")

				const all = await store.getRecentlyPlayed(0)
				expect(all.map(g => g.id)).toEqual([alpha, gamma, beta, delta])

				const top = await store.getRecentlyPlayed(3)
				expect(top.map(g => g.id)).toEqual([alpha, gamma, beta])

				expect(await store.getRecentlyPlayed(-1)).toHaveLength(4)
				expect(await store.getRecentlyPlayed(10)).toHaveLength(4)
			})
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Persistence
	// ─────────────────────────────────────────────────────────────────────────

	describe("save / load", () => {
		it("reproduces an equal store", async () => {
			await withTempDir(async dir => {
				const root = join(dir, "roms")
				await seedRoms(root)
				const { store, setClock } = createStore(dir)
				await store.addScanPath(root)
				await store.scan()
				const [first] = await store.getGames()
				await store.toggleFavorite(first?.id ?? "")
				setClock("2026-05-06T07:00:00.000Z")
				await store.recordPlay(first?.id ?? "")
				await store.save()

				const copy = await LibraryStore.open({ path: store.path })
				expect(await copy.getGames()).toEqual(await store.getGames())
				expect(await copy.getScanPaths()).toEqual(await store.getScanPaths())
				expect(await copy.getCategories()).toEqual(await store.getCategories())
				expect(await copy.getPlatforms()).toEqual(await store.getPlatforms())
				expect(await copy.getLastScan()).toEqual(await store.getLastScan())
			})
		})

		it("writes to an explicit path without changing the default one", async () => {
			await withTempDir(async dir => {
				const { store } = createStore(dir)
				await store.addScanPath(dir)
				const other = join(dir, "export", "copy.json")
				await store.save(other)

				const copy = new LibraryStore({ path: other })
				expect(await copy.load()).toBe(true)
				expect(await copy.getScanPaths()).toEqual([dir])
				expect(store.path).toBe(join(dir, "config", "library.json"))
			})
		})

		it("starts empty when the snapshot does not exist", async () => {
			await withTempDir(async dir => {
				const { store } = createStore(dir)
				expect(await store.load()).toBe(false)
				expect(await store.size()).toBe(0)
				expect(isZeroTime(await store.getLastScan())).toBe(true)
			})
		})

		it("fails with DecodeError on a corrupt snapshot", async () => {
			await withTempDir(async dir => {
				const path = join(dir, "library.json")
				await writeFile(path, "{ truncated", "utf8")
				await expect(LibraryStore.open({ path })).rejects.toBeInstanceOf(DecodeError)
			})
		})

		it("fails with PersistenceError when the snapshot cannot be written", async () => {
			await withTempDir(async dir => {
				await writeFile(join(dir, "blocker"), "x")
				const store = new LibraryStore({ path: join(dir, "blocker", "library.json") })
				await expect(store.save()).rejects.toBeInstanceOf(PersistenceError)
			})
		})
	})
})
