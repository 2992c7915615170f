import { describe, it, expect } from "vitest"
import {
	decodeSnapshot,
	encodeSnapshot,
	serializeGame,
} from "../../src/library/snapshot.js"
import { createGameRecord } from "../../src/library/scanner.js"
import { isZeroTime, zeroTime, type LibraryState } from "../../src/types.js"

describe("snapshot codec", () => {
	it("writes snake_case keys with RFC 3339 timestamps", () => {
		const game = createGameRecord("/roms/gb/Tetris.gb", "GB")
		expect(serializeGame(game)).toEqual({
			id: "TETRISV",
			title: "Tetris",
			description: "",
			platform: "GB",
			path: "/roms/gb/Tetris.gb",
			cover_path: "",
			last_played: "0001-01-01T00:00:00.000Z",
			play_count: 0,
			favorite: false,
			category: "Uncategorized",
		})
	})

	it("decodes what it encodes", () => {
		const game = createGameRecord("/roms/gb/Tetris.gb", "GB")
		game.favorite = true
		game.playCount = 3
		game.lastPlayed = new Date("2026-03-01T12:30:00.000Z")
		const state: LibraryState = {
			games: [game],
			scanPaths: ["/roms"],
			categories: { Uncategorized: 1 },
			platforms: { GB: 1 },
			lastScan: new Date("2026-03-02T08:00:00.000Z"),
		}

		const decoded = decodeSnapshot(encodeSnapshot(state))
		expect(decoded).toEqual({ ok: true, state })
	})

	it("accepts files written with nanosecond offsets and null collections", () => {
		const decoded = decodeSnapshot(
			JSON.stringify({
				games: [
					{
						id: "CONTRAQ",
						title: "Contra",
						platform: "NES",
						path: "/roms/Contra.nes",
						last_played: "2026-01-02T10:00:00.123456789+01:00",
					},
				],
				scan_paths: null,
				categories: null,
				platforms: { NES: 1 },
				last_scan: "0001-01-01T00:00:00Z",
			}),
		)

		expect(decoded.ok).toBe(true)
		if (!decoded.ok) return
		expect(decoded.state.scanPaths).toEqual([])
		expect(decoded.state.categories).toEqual({})
		expect(isZeroTime(decoded.state.lastScan)).toBe(true)
		const game = decoded.state.games[0]
		expect(game?.lastPlayed.toISOString()).toBe("2026-01-02T09:00:00.123Z")
		expect(game?.playCount).toBe(0)
		expect(game?.favorite).toBe(false)
		expect(game?.coverPath).toBe("")
	})

	it("treats a missing last_scan as never", () => {
		const decoded = decodeSnapshot("{}")
		expect(decoded).toEqual({
			ok: true,
			state: {
				games: [],
				scanPaths: [],
				categories: {},
				platforms: {},
				lastScan: zeroTime(),
			},
		})
	})

	it("reports invalid JSON", () => {
		const decoded = decodeSnapshot("{not json")
		expect(decoded.ok).toBe(false)
		if (decoded.ok) return
		expect(decoded.error).toMatch(/^invalid JSON/)
	})

	it("reports the path of a field with the wrong type", () => {
		const decoded = decodeSnapshot(
			JSON.stringify({ games: [{ id: "X", favorite: "yes" }] }),
		)
		expect(decoded.ok).toBe(false)
		if (decoded.ok) return
		expect(decoded.error).toMatch(/^games\.0\.favorite: /)
	})

	it("rejects unparsable timestamps", () => {
		const decoded = decodeSnapshot(JSON.stringify({ last_scan: "yesterday" }))
		expect(decoded).toEqual({
			ok: false,
			error: "last_scan: Invalid timestamp: yesterday",
		})
	})
})
