/**
 * Request router: message type → library store call
 */

import { z } from "zod"
import { errorMessage } from "../errors.js"
import { GAME_NOT_FOUND, type LibraryStore } from "../library/store.js"
import { serializeGame } from "../library/snapshot.js"
import { log } from "../logger.js"
import {
	MessageType,
	PROTOCOL_VERSION,
	errorResponse,
	successResponse,
	type Request,
	type RequestHandler,
	type Response,
} from "./protocol.js"

export const UNKNOWN_MESSAGE_TYPE = "Unknown message type"

const GameListPayload = z
	.object({
		platform: z.string().optional(),
		category: z.string().optional(),
		limit: z.number().int().optional(),
	})
	.nullish()

const RecentPayload = z
	.object({
		limit: z.number().int().optional(),
	})
	.nullish()

const GameIdPayload = z.string()

const ScanPathPayload = z.object({
	path: z.string().min(1),
})

class InvalidPayloadError extends Error {
	constructor(type: string, detail: string) {
		super(`Invalid payload for ${type}: ${detail}`)
		this.name = "InvalidPayloadError"
	}
}

function decodePayload<T extends z.ZodTypeAny>(
	schema: T,
	request: Request,
): z.output<T> {
	const parsed = schema.safeParse(request.payload)
	if (!parsed.success) {
		throw new InvalidPayloadError(
			request.type,
			parsed.error.issues[0]?.message ?? "unexpected shape",
		)
	}
	return parsed.data
}

type Route = (request: Request) => Promise<Response>

/**
 * Dispatches requests onto a LibraryStore. Any error a route throws
 * becomes a failure response carrying the error's message.
 */
export class RequestRouter {
	private readonly routes: ReadonlyMap<string, Route>

	constructor(private readonly store: LibraryStore) {
		this.routes = new Map<string, Route>([
			[MessageType.ListGames, req => this.listGames(req)],
			[MessageType.GetGame, req => this.getGame(req)],
			[MessageType.GetFavorites, req => this.getFavorites(req)],
			[MessageType.ToggleFavorite, req => this.toggleFavorite(req)],
			[MessageType.Scan, req => this.scan(req)],
			[MessageType.Status, req => this.status(req)],
			[MessageType.GetRecent, req => this.getRecent(req)],
			[MessageType.GetCategories, req => this.getCategories(req)],
			[MessageType.GetPlatforms, req => this.getPlatforms(req)],
			[MessageType.AddScanPath, req => this.addScanPath(req)],
			[MessageType.LaunchGame, req => this.launchGame(req)],
		])
	}

	/** Message types this router answers */
	get messageTypes(): string[] {
		return [...this.routes.keys()]
	}

	/** Bound handler for IPCServer.setHandler() */
	get handler(): RequestHandler {
		return request => this.handle(request)
	}

	async handle(request: Request): Promise<Response> {
		const route = this.routes.get(request.type)
		if (!route) {
			log.router.debug({ type: request.type, id: request.id }, "unknown message type")
			return errorResponse(request.id, UNKNOWN_MESSAGE_TYPE)
		}

		try {
			return await route(request)
		} catch (err) {
			log.router.warn(
				{ type: request.type, id: request.id, error: errorMessage(err) },
				"request failed",
			)
			return errorResponse(request.id, errorMessage(err))
		}
	}

	private async listGames(request: Request): Promise<Response> {
		const payload = decodePayload(GameListPayload, request)
		const games = await this.store.getGames({
			platform: payload?.platform ?? "",
			category: payload?.category ?? "",
		})
		const limit = payload?.limit ?? 0
		const limited = limit > 0 && limit < games.length ? games.slice(0, limit) : games
		return successResponse(request, limited.map(serializeGame))
	}

	private async getGame(request: Request): Promise<Response> {
		const id = decodePayload(GameIdPayload, request)
		const game = await this.store.getGameById(id)
		if (!game) {
			return errorResponse(request.id, GAME_NOT_FOUND)
		}
		return successResponse(request, serializeGame(game))
	}

	private async getFavorites(request: Request): Promise<Response> {
		const games = await this.store.getFavorites()
		return successResponse(request, games.map(serializeGame))
	}

	private async toggleFavorite(request: Request): Promise<Response> {
		const id = decodePayload(GameIdPayload, request)
		await this.store.toggleFavorite(id)
		return successResponse(request)
	}

	private async scan(request: Request): Promise<Response> {
		const summary = await this.store.scan()
		return successResponse(request, `Found ${summary.found} games`)
	}

	private async status(request: Request): Promise<Response> {
		return successResponse(
			request,
			{ status: "ready", version: PROTOCOL_VERSION },
			MessageType.Status,
		)
	}

	private async getRecent(request: Request): Promise<Response> {
		const payload = decodePayload(RecentPayload, request)
		const games = await this.store.getRecentlyPlayed(payload?.limit ?? 0)
		return successResponse(request, games.map(serializeGame))
	}

	private async getCategories(request: Request): Promise<Response> {
		return successResponse(request, await this.store.getCategories())
	}

	private async getPlatforms(request: Request): Promise<Response> {
		return successResponse(request, await this.store.getPlatforms())
	}

	private async addScanPath(request: Request): Promise<Response> {
		const { path } = decodePayload(ScanPathPayload, request)
		await this.store.addScanPath(path)
		await this.store.save()
		return successResponse(request)
	}

	private async launchGame(request: Request): Promise<Response> {
		const id = decodePayload(GameIdPayload, request)
		const game = await this.store.recordPlay(id)
		return successResponse(request, serializeGame(game))
	}
}
