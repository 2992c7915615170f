import type { CountMap, GameRecord } from "../types.js"

export interface LibraryCounts {
	platforms: CountMap
	categories: CountMap
}

export interface CountEntry {
	name: string
	count: number
}

function bump(map: CountMap, key: string, amount = 1): void {
	map[key] = (map[key] ?? 0) + amount
}

/**
 * Platform and category counts for a record sequence.
 */
export function computeLibraryCounts(games: readonly GameRecord[]): LibraryCounts {
	const platforms: CountMap = {}
	const categories: CountMap = {}

	for (const game of games) {
		bump(platforms, game.platform)
		bump(categories, game.category)
	}

	return { platforms, categories }
}

function sortCountsDesc(a: CountEntry, b: CountEntry): number {
	if (b.count !== a.count) return b.count - a.count
	return a.name.toLowerCase().localeCompare(b.name.toLowerCase())
}

/**
 * Count map as a list, largest first, ties by name.
 */
export function rankCounts(counts: CountMap, topN?: number): CountEntry[] {
	const entries = Object.entries(counts)
		.map(([name, count]) => ({ name, count }))
		.sort(sortCountsDesc)
	return topN === undefined ? entries : entries.slice(0, topN)
}
