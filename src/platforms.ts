/**
 * Platform table: which file extensions belong to which system.
 *
 * Built once at startup and handed to the scanner. The table and its
 * extension lists are frozen.
 */

export type PlatformTable = Readonly<Record<string, readonly string[]>>

/**
 * ROM file extensions by platform
 */
export const DEFAULT_PLATFORM_EXTENSIONS: PlatformTable = createPlatformTable({
	NES: [".nes", ".unf", ".unif"],
	SNES: [".sfc", ".smc"],
	N64: [".n64", ".z64", ".v64"],
	GBA: [".gba"],
	GB: [".gb", ".gbc"],
	ATARI: [".a26", ".bin"],
})

/**
 * Normalize and freeze a platform table. Extensions are lower-cased and
 * given a leading dot. An extension claimed by two platforms is rejected,
 * since classification would depend on iteration order.
 */
export function createPlatformTable(
	entries: Record<string, readonly string[]>,
): PlatformTable {
	const owner = new Map<string, string>()
	const table: Record<string, readonly string[]> = {}

	for (const [platform, extensions] of Object.entries(entries)) {
		const normalized = extensions.map(normalizeExtension)
		for (const ext of normalized) {
			const existing = owner.get(ext)
			if (existing !== undefined && existing !== platform) {
				throw new Error(
					`Extension ${ext} is mapped to both ${existing} and ${platform}`,
				)
			}
			owner.set(ext, platform)
		}
		table[platform] = Object.freeze([...new Set(normalized)])
	}

	return Object.freeze(table)
}

function normalizeExtension(ext: string): string {
	const lower = ext.trim().toLowerCase()
	return lower.startsWith(".") ? lower : `.${lower}`
}

/**
 * Build an extension → platform index for O(1) lookups during a scan.
 */
export function indexByExtension(table: PlatformTable): Map<string, string> {
	const index = new Map<string, string>()
	for (const [platform, extensions] of Object.entries(table)) {
		for (const ext of extensions) {
			index.set(ext, platform)
		}
	}
	return index
}

/**
 * Lower-cased extension of a filename including the dot, or "" when none.
 * Everything from the last dot counts, so ".nes" alone is a NES file.
 */
export function extensionOf(filename: string): string {
	const dot = filename.lastIndexOf(".")
	if (dot < 0) return ""
	return filename.substring(dot).toLowerCase()
}

/**
 * Platform for a file, or undefined when its extension is unmapped.
 */
export function detectPlatform(
	filename: string,
	index: ReadonlyMap<string, string>,
): string | undefined {
	const ext = extensionOf(filename)
	return ext ? index.get(ext) : undefined
}
