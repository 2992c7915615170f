/**
 * ROM filename helpers: stable identity and display titles.
 */

import { basename } from "node:path"

/** Region markers dropped from display titles */
const REGION_MARKERS = ["(USA)", "(Europe)", "(Japan)"] as const

/** Longest basename prefix kept in an ID */
const ID_PREFIX_LENGTH = 8

/**
 * Filename without its extension (everything from the last dot).
 */
export function stripExtension(filename: string): string {
	const dot = filename.lastIndexOf(".")
	return dot < 0 ? filename : filename.substring(0, dot)
}

/**
 * 32-bit polynomial rolling hash: hash = hash * 31 + codePoint, mod 2^32.
 */
export function pathHash(path: string): number {
	let hash = 0
	for (const ch of path) {
		hash = (Math.imul(hash, 31) + (ch.codePointAt(0) ?? 0)) >>> 0
	}
	return hash
}

/**
 * Derive a record ID from a file path.
 *
 * Uppercased basename (no extension, at most 8 characters) plus one letter
 * from the path hash. Only 26 suffixes exist, so two paths sharing a
 * truncated basename collide whenever their hashes agree mod 26.
 *
 * @example
 * generateId("/roms/gba/Metroid Fusion.gba") // "METROID Y"
 */
export function generateId(path: string): string {
	// Uppercase before truncating: "ß" becomes "SS" and must count as two
	const base = Array.from(stripExtension(basename(path)).toUpperCase())
		.slice(0, ID_PREFIX_LENGTH)
		.join("")
	const suffix = String.fromCharCode(65 + (pathHash(path) % 26))
	return base + suffix
}

/**
 * Display title from a filename: no extension, separators as spaces,
 * region markers removed.
 */
export function cleanGameTitle(filename: string): string {
	let title = stripExtension(filename).replaceAll("_", " ").replaceAll("-", " ")
	for (const marker of REGION_MARKERS) {
		title = title.replaceAll(marker, "")
	}
	return title.trim()
}
