/**
 * Line client for the loopback protocol
 *
 * The server answers each connection in request order, so responses are
 * matched to requests by position.
 */

import { connect, type Socket } from "node:net"
import { z } from "zod"
import { TransportError, errorMessage } from "../errors.js"
import { log } from "../logger.js"
import { DEFAULT_PORT, splitLines, type Response } from "./protocol.js"

const ResponseSchema = z.object({
	type: z.string(),
	id: z.string().optional(),
	success: z.boolean(),
	data: z.unknown().optional(),
	error: z.string().optional(),
})

export interface IPCClientOptions {
	port?: number
	host?: string
}

export interface OutgoingRequest {
	type: string
	id?: string
	payload?: unknown
}

interface Waiter {
	resolve: (response: Response) => void
	reject: (error: Error) => void
}

export class IPCClient {
	private socket: Socket | null = null
	private buffer = ""
	private readonly waiters: Waiter[] = []
	private readonly port: number
	private readonly host: string

	constructor(options: IPCClientOptions = {}) {
		this.port = options.port ?? DEFAULT_PORT
		this.host = options.host ?? "127.0.0.1"
	}

	/** Open a client and wait until it is connected. */
	static async connect(options: IPCClientOptions = {}): Promise<IPCClient> {
		const client = new IPCClient(options)
		await client.open()
		return client
	}

	open(): Promise<void> {
		return new Promise((resolve, reject) => {
			const socket = connect({ port: this.port, host: this.host })
			socket.setEncoding("utf8")

			const onConnectError = (error: Error) => {
				reject(
					new TransportError(
						`Cannot connect to ${this.host}:${this.port}: ${error.message}`,
						{ cause: error },
					),
				)
			}
			socket.once("error", onConnectError)
			socket.once("connect", () => {
				socket.off("error", onConnectError)
				socket.on("error", error => this.failAll(error))
				this.socket = socket
				resolve()
			})
			socket.on("data", (chunk: string) => this.receive(chunk))
			socket.on("close", () => {
				this.socket = null
				this.failAll(new Error("connection closed"))
			})
		})
	}

	/** Send a request and wait for its response. */
	request(request: OutgoingRequest): Promise<Response> {
		return this.sendLine(JSON.stringify(request))
	}

	/**
	 * Send one raw line (a newline is appended) and wait for the response
	 * it produces. Blank lines produce none, so don't send them here.
	 */
	sendLine(line: string): Promise<Response> {
		const socket = this.socket
		if (!socket) {
			return Promise.reject(new TransportError("Client is not connected"))
		}
		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject })
			socket.write(line + "\n")
		})
	}

	/** Write text as is, without waiting for anything. */
	write(text: string): void {
		if (!this.socket) {
			throw new TransportError("Client is not connected")
		}
		this.socket.write(text)
	}

	/** Resolves with the next response that arrives. */
	nextResponse(): Promise<Response> {
		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject })
		})
	}

	close(): Promise<void> {
		const socket = this.socket
		if (!socket) return Promise.resolve()
		return new Promise(resolve => {
			socket.once("close", () => resolve())
			socket.end()
		})
	}

	private receive(chunk: string): void {
		const { lines, rest } = splitLines(this.buffer + chunk)
		this.buffer = rest

		for (const line of lines) {
			if (line.trim() === "") continue
			const waiter = this.waiters.shift()
			if (!waiter) {
				log.ipc.debug({ line }, "response with no pending request, dropping it")
				continue
			}

			let json: unknown
			try {
				json = JSON.parse(line)
			} catch (err) {
				waiter.reject(new TransportError(`Invalid response line: ${errorMessage(err)}`))
				continue
			}
			const parsed = ResponseSchema.safeParse(json)
			if (parsed.success) {
				waiter.resolve(parsed.data)
			} else {
				waiter.reject(new TransportError("Response does not match the protocol"))
			}
		}
	}

	private failAll(error: Error): void {
		const transportError =
			error instanceof TransportError
				? error
				: new TransportError(error.message, { cause: error })
		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(transportError)
		}
	}
}
