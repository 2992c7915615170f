/**
 * Snapshot file codec
 *
 * The snapshot is a full dump of library state with snake_case keys:
 * `{ games, scan_paths, categories, platforms, last_scan }`. The same
 * record shape goes over the wire. Decoding is lenient about missing
 * fields and nulls (older files), strict about types.
 */

import { z } from "zod"
import {
	zeroTime,
	type CountMap,
	type GameRecord,
	type LibraryState,
} from "../types.js"

const TimestampSchema = z
	.string()
	.transform((value, ctx) => {
		const date = new Date(value)
		if (Number.isNaN(date.getTime())) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Invalid timestamp: ${value}`,
			})
			return z.NEVER
		}
		return date
	})
	.nullish()
	.transform(value => value ?? zeroTime())

const GameRecordSchema = z
	.object({
		id: z.string(),
		title: z.string().default(""),
		description: z.string().default(""),
		platform: z.string().default(""),
		path: z.string().default(""),
		cover_path: z.string().default(""),
		last_played: TimestampSchema,
		play_count: z.number().int().min(0).default(0),
		favorite: z.boolean().default(false),
		category: z.string().default(""),
	})
	.transform(
		(raw): GameRecord => ({
			id: raw.id,
			title: raw.title,
			description: raw.description,
			platform: raw.platform,
			path: raw.path,
			coverPath: raw.cover_path,
			lastPlayed: raw.last_played,
			playCount: raw.play_count,
			favorite: raw.favorite,
			category: raw.category,
		}),
	)

const CountMapSchema = z
	.record(z.string(), z.number().int())
	.nullish()
	.transform((value): CountMap => value ?? {})

export const SnapshotSchema = z
	.object({
		games: z
			.array(GameRecordSchema)
			.nullish()
			.transform(value => value ?? []),
		scan_paths: z
			.array(z.string())
			.nullish()
			.transform(value => value ?? []),
		categories: CountMapSchema,
		platforms: CountMapSchema,
		last_scan: TimestampSchema,
	})
	.transform(
		(raw): LibraryState => ({
			games: raw.games,
			scanPaths: raw.scan_paths,
			categories: raw.categories,
			platforms: raw.platforms,
			lastScan: raw.last_scan,
		}),
	)

export interface SerializedGameRecord {
	id: string
	title: string
	description: string
	platform: string
	path: string
	cover_path: string
	last_played: string
	play_count: number
	favorite: boolean
	category: string
}

export interface SerializedSnapshot {
	games: SerializedGameRecord[]
	scan_paths: string[]
	categories: CountMap
	platforms: CountMap
	last_scan: string
}

export function formatTimestamp(date: Date): string {
	return date.toISOString()
}

export function serializeGame(game: GameRecord): SerializedGameRecord {
	return {
		id: game.id,
		title: game.title,
		description: game.description,
		platform: game.platform,
		path: game.path,
		cover_path: game.coverPath,
		last_played: formatTimestamp(game.lastPlayed),
		play_count: game.playCount,
		favorite: game.favorite,
		category: game.category,
	}
}

export function serializeSnapshot(state: LibraryState): SerializedSnapshot {
	return {
		games: state.games.map(serializeGame),
		scan_paths: [...state.scanPaths],
		categories: { ...state.categories },
		platforms: { ...state.platforms },
		last_scan: formatTimestamp(state.lastScan),
	}
}

export type DecodeResult =
	| { ok: true; state: LibraryState }
	| { ok: false; error: string }

/**
 * Parse snapshot text. Never throws; the store turns failures into
 * DecodeError with the file path attached.
 */
export function decodeSnapshot(text: string): DecodeResult {
	let json: unknown
	try {
		json = JSON.parse(text)
	} catch (err) {
		return {
			ok: false,
			error: `invalid JSON (${err instanceof Error ? err.message : String(err)})`,
		}
	}

	const parsed = SnapshotSchema.safeParse(json)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""
		return { ok: false, error: `${where}${issue?.message ?? "invalid snapshot"}` }
	}
	return { ok: true, state: parsed.data }
}

export function encodeSnapshot(state: LibraryState): string {
	return JSON.stringify(serializeSnapshot(state), null, 2)
}
