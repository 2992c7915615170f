/**
 * Shared type definitions for the library daemon
 */

// ─────────────────────────────────────────────────────────────────────────────
// Games
// ─────────────────────────────────────────────────────────────────────────────

export interface GameRecord {
	/** Derived from the path, see generateId() */
	id: string
	title: string
	description: string
	/** Platform name from the platform table (NES, GBA, ...) */
	platform: string
	/** Source file path, also the scan key */
	path: string
	coverPath: string
	/** ZERO_TIME when never played */
	lastPlayed: Date
	playCount: number
	favorite: boolean
	category: string
}

/** Category assigned to every record by the scanner */
export const DEFAULT_CATEGORY = "Uncategorized"

/**
 * Zero timestamp, used for "never" (0001-01-01T00:00:00Z on disk).
 * Date.UTC() maps two-digit years to 19xx, hence setUTCFullYear.
 */
export function zeroTime(): Date {
	const date = new Date(0)
	date.setUTCFullYear(1, 0, 1)
	date.setUTCHours(0, 0, 0, 0)
	return date
}

export function isZeroTime(date: Date): boolean {
	return date.getTime() === zeroTime().getTime()
}

// ─────────────────────────────────────────────────────────────────────────────
// Library state
// ─────────────────────────────────────────────────────────────────────────────

/** Name → record count */
export type CountMap = Record<string, number>

export interface LibraryState {
	games: GameRecord[]
	scanPaths: string[]
	categories: CountMap
	platforms: CountMap
	lastScan: Date
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export interface GameFilter {
	platform?: string
	category?: string
}
