/**
 * Wire protocol: newline-delimited JSON over loopback TCP
 *
 * Request:  { "type": string, "id"?: string, "payload"?: any }
 * Response: { "type": string, "id"?: string, "success": bool, "data"?: any, "error"?: string }
 */

import { z } from "zod"

export const DEFAULT_PORT = 9847
export const PROTOCOL_VERSION = "1.0.0"

export const MessageType = {
	ListGames: "list_games",
	GetGame: "get_game",
	LaunchGame: "launch_game",
	GetCategories: "get_categories",
	GetPlatforms: "get_platforms",
	GetFavorites: "get_favorites",
	ToggleFavorite: "toggle_favorite",
	GetRecent: "get_recent",
	Scan: "scan",
	AddScanPath: "add_scan_path",
	Status: "status",
	Error: "error",
	Success: "success",
} as const

export type MessageType = (typeof MessageType)[keyof typeof MessageType]

export const RequestSchema = z.object({
	type: z.string().default(""),
	id: z.string().optional(),
	payload: z.unknown().optional(),
})

export type Request = z.infer<typeof RequestSchema>

export interface Response {
	type: string
	id?: string
	success: boolean
	data?: unknown
	error?: string
}

export type RequestHandler = (request: Request) => Response | Promise<Response>

export type DecodedLine =
	| { ok: true; request: Request }
	| { ok: false; error: string }

/**
 * Decode one request line (already stripped of its newline).
 */
export function decodeRequest(line: string): DecodedLine {
	let json: unknown
	try {
		json = JSON.parse(line)
	} catch (err) {
		return {
			ok: false,
			error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
		}
	}

	const parsed = RequestSchema.safeParse(json)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""
		return {
			ok: false,
			error: `Invalid request: ${where}${issue?.message ?? "expected an object"}`,
		}
	}
	return { ok: true, request: parsed.data }
}

/**
 * Serialize a response as one line. Keys go out in a fixed order and
 * empty id / data / error are left out.
 */
export function encodeResponse(response: Response): string {
	const out: Record<string, unknown> = { type: response.type }
	if (response.id) out["id"] = response.id
	out["success"] = response.success
	if (response.data !== undefined && response.data !== null) out["data"] = response.data
	if (response.error) out["error"] = response.error
	return JSON.stringify(out) + "\n"
}

export function successResponse(
	request: Pick<Request, "id">,
	data?: unknown,
	type: string = MessageType.Success,
): Response {
	const response: Response = { type, success: true }
	if (request.id) response.id = request.id
	if (data !== undefined) response.data = data
	return response
}

export function errorResponse(id: string | undefined, error: string): Response {
	const response: Response = { type: MessageType.Error, success: false, error }
	if (id) response.id = id
	return response
}

/**
 * Split buffered text into complete lines. Returns the lines and the
 * unterminated remainder.
 */
export function splitLines(buffer: string): { lines: string[]; rest: string } {
	const parts = buffer.split("\n")
	const rest = parts.pop() ?? ""
	return { lines: parts, rest }
}
