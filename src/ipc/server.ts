/**
 * Loopback IPC server
 *
 * One listener, one async worker per connection. Each worker frames the
 * socket's text on "\n", answers lines strictly in the order they arrive
 * and writes one response line per request. When the peer shuts its write
 * side, every line already received is still answered before the socket
 * is ended.
 *
 * Lifecycle: stopped → starting → running → stopping → stopped.
 * - start() on a running server is a no-op; during a start it returns the
 *   pending start; during a stop it waits for the stop, then starts.
 * - stop() on a stopped server is a no-op; during a stop it returns the
 *   pending stop. It does not wait for in-flight handlers.
 */

import { createServer, type Server, type Socket } from "node:net"
import { FatalStartupError, errorMessage } from "../errors.js"
import { log } from "../logger.js"
import {
	DEFAULT_PORT,
	MessageType,
	decodeRequest,
	encodeResponse,
	errorResponse,
	splitLines,
	successResponse,
	type Request,
	type RequestHandler,
	type Response,
} from "./protocol.js"

/** Longest request line accepted, in UTF-16 code units */
export const MAX_LINE_LENGTH = 1024 * 1024

export type ServerState = "stopped" | "starting" | "running" | "stopping"

export interface IPCServerOptions {
	/** 0 picks a free port; getPort() reports it once running */
	port?: number
	host?: string
}

/** Answer used when no handler is installed */
export function defaultHandler(request: Request): Response {
	return successResponse(request, { status: "ready" }, MessageType.Status)
}

interface Connection {
	socket: Socket
	buffer: string
	/** Tail of this connection's work chain; keeps responses in request order */
	pending: Promise<void>
	/** Set once the connection is winding down; later input is ignored */
	closing: boolean
}

export class IPCServer {
	private server: Server | null = null
	private state: ServerState = "stopped"
	private handler: RequestHandler | null = null
	private readonly connections = new Map<Socket, Connection>()
	private readonly requestedPort: number
	private readonly host: string
	private boundPort: number | null = null
	private starting: Promise<void> | null = null
	private stopping: Promise<void> | null = null

	constructor(options: IPCServerOptions = {}) {
		this.requestedPort = options.port ?? DEFAULT_PORT
		this.host = options.host ?? "127.0.0.1"
	}

	setHandler(handler: RequestHandler | null): void {
		this.handler = handler
	}

	getState(): ServerState {
		return this.state
	}

	isRunning(): boolean {
		return this.state === "running"
	}

	/** Bound port while running, otherwise the configured one */
	getPort(): number {
		return this.boundPort ?? this.requestedPort
	}

	getHost(): string {
		return this.host
	}

	clientCount(): number {
		return this.connections.size
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Lifecycle
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Bind the listener. Resolves once bound; connections are accepted in
	 * the background. Rejects with FatalStartupError when the port cannot be
	 * bound.
	 */
	async start(): Promise<void> {
		if (this.state === "running") return
		if (this.state === "starting" && this.starting) return this.starting
		if (this.state === "stopping" && this.stopping) {
			await this.stopping
			return this.start()
		}

		this.state = "starting"
		this.starting = this.listen().finally(() => {
			this.starting = null
		})
		return this.starting
	}

	private listen(): Promise<void> {
		return new Promise((resolve, reject) => {
			// Half-open: a client may send its requests and shut its write side,
			// and still gets every response before the server ends the socket
			const server = createServer({ allowHalfOpen: true }, socket => this.accept(socket))

			const onStartupError = (error: NodeJS.ErrnoException) => {
				this.state = "stopped"
				this.server = null
				const reason =
					error.code === "EADDRINUSE"
						? `port ${this.requestedPort} already in use`
						: error.message
				log.ipc.fatal({ host: this.host, port: this.requestedPort, error: error.message }, "cannot bind IPC listener")
				reject(
					new FatalStartupError(
						`Failed to start server on ${this.host}:${this.requestedPort}: ${reason}`,
						{ cause: error },
					),
				)
			}

			server.once("error", onStartupError)
			server.listen(this.requestedPort, this.host, () => {
				server.off("error", onStartupError)
				server.on("error", error => {
					log.ipc.error({ error: error.message }, "listener error")
				})

				const address = server.address()
				this.boundPort =
					address && typeof address === "object" ? address.port : this.requestedPort
				this.server = server
				this.state = "running"
				log.ipc.info({ host: this.host, port: this.boundPort }, "IPC server started")
				resolve()
			})
		})
	}

	/**
	 * Close every connection and the listener.
	 */
	async stop(): Promise<void> {
		if (this.state === "stopped") return
		if (this.state === "stopping" && this.stopping) return this.stopping
		if (this.state === "starting" && this.starting) {
			// A failed start leaves the server stopped already
			await this.starting.catch(() => undefined)
			return this.stop()
		}

		this.state = "stopping"
		this.stopping = this.shutdown().finally(() => {
			this.stopping = null
		})
		return this.stopping
	}

	private shutdown(): Promise<void> {
		for (const socket of this.connections.keys()) {
			socket.destroy()
		}
		this.connections.clear()

		const server = this.server
		this.server = null

		return new Promise(resolve => {
			const done = () => {
				this.boundPort = null
				this.state = "stopped"
				log.ipc.info("IPC server stopped")
				resolve()
			}
			if (!server) {
				done()
				return
			}
			server.close(error => {
				if (error) {
					log.ipc.warn({ error: error.message }, "error closing listener")
				}
				done()
			})
		})
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Connections
	// ═══════════════════════════════════════════════════════════════════════════

	private accept(socket: Socket): void {
		if (this.state !== "running") {
			socket.destroy()
			return
		}

		const connection: Connection = {
			socket,
			buffer: "",
			pending: Promise.resolve(),
			closing: false,
		}
		this.connections.set(socket, connection)
		const remote = `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`
		log.ipc.info({ remote, clients: this.connections.size }, "client connected")

		socket.setEncoding("utf8")
		socket.on("data", (chunk: string) => this.receive(connection, chunk))
		socket.on("end", () => this.finish(connection))
		socket.on("error", error => {
			log.ipc.warn({ remote, error: error.message }, "connection error")
		})
		socket.on("close", () => {
			this.connections.delete(socket)
			log.ipc.info({ remote, clients: this.connections.size }, "client disconnected")
		})
	}

	private receive(connection: Connection, chunk: string): void {
		if (connection.closing) return
		const { lines, rest } = splitLines(connection.buffer + chunk)
		connection.buffer = rest

		for (const line of lines) {
			this.enqueue(connection, () => this.processLine(connection.socket, line))
		}

		if (connection.buffer.length > MAX_LINE_LENGTH) {
			log.ipc.warn({ length: connection.buffer.length }, "request line too long, closing connection")
			connection.buffer = ""
			connection.closing = true
			this.enqueue(connection, () => {
				this.send(
					connection.socket,
					errorResponse(undefined, `Request line exceeds ${MAX_LINE_LENGTH} characters`),
				)
			})
			this.enqueue(connection, () => {
				connection.socket.end()
			})
		}
	}

	/**
	 * Peer shut its write side. Answer an unterminated last line, then end
	 * the socket once every queued response has been written.
	 */
	private finish(connection: Connection): void {
		if (!connection.closing) {
			connection.closing = true
			const last = connection.buffer
			connection.buffer = ""
			this.enqueue(connection, () => this.processLine(connection.socket, last))
		}
		this.enqueue(connection, () => {
			if (!connection.socket.destroyed) connection.socket.end()
		})
	}

	private enqueue(connection: Connection, work: () => void | Promise<void>): void {
		connection.pending = connection.pending.then(work).catch(err => {
			log.ipc.error({ error: errorMessage(err) }, "cannot answer request, closing connection")
			connection.socket.destroy()
		})
	}

	private async processLine(socket: Socket, raw: string): Promise<void> {
		const line = raw.trim()
		if (line === "" || socket.destroyed) return

		const decoded = decodeRequest(line)
		let response: Response
		if (!decoded.ok) {
			log.ipc.debug({ error: decoded.error }, "rejected request line")
			response = errorResponse(undefined, decoded.error)
		} else {
			response = await this.dispatch(decoded.request)
		}

		this.send(socket, response)
	}

	private async dispatch(request: Request): Promise<Response> {
		log.ipc.debug({ type: request.type, id: request.id }, "request")
		const handler = this.handler ?? defaultHandler
		try {
			return await handler(request)
		} catch (err) {
			log.ipc.error({ type: request.type, id: request.id, error: errorMessage(err) }, "handler threw")
			return errorResponse(request.id, errorMessage(err))
		}
	}

	private send(socket: Socket, response: Response): void {
		if (socket.destroyed || !socket.writable) {
			log.ipc.debug({ type: response.type, id: response.id }, "dropping response for closed connection")
			return
		}
		// Loopback clients read their responses; no backpressure handling
		socket.write(encodeResponse(response))
	}
}
