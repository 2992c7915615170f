/**
 * Error taxonomy for the library daemon
 *
 * Domain errors (NotFound, NotADirectory, Decode, Persistence) surface to
 * clients as failure responses. TransportError covers malformed lines and
 * socket failures, which only ever affect one connection. FatalStartupError
 * aborts `serve`.
 */

export type LibraryErrorCode =
	| "NOT_FOUND"
	| "NOT_A_DIRECTORY"
	| "DECODE_FAILED"
	| "PERSISTENCE_FAILED"
	| "TRANSPORT_FAILED"
	| "STARTUP_FAILED"

export class LibraryError extends Error {
	readonly code: LibraryErrorCode

	constructor(code: LibraryErrorCode, message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = "LibraryError"
		this.code = code
	}
}

export class NotFoundError extends LibraryError {
	constructor(message: string, options?: ErrorOptions) {
		super("NOT_FOUND", message, options)
		this.name = "NotFoundError"
	}
}

export class NotADirectoryError extends LibraryError {
	readonly path: string

	constructor(path: string) {
		super("NOT_A_DIRECTORY", `Not a directory: ${path}`)
		this.name = "NotADirectoryError"
		this.path = path
	}
}

/** Snapshot file exists but is not valid JSON or has the wrong shape. */
export class DecodeError extends LibraryError {
	readonly path: string

	constructor(path: string, detail: string, options?: ErrorOptions) {
		super("DECODE_FAILED", `Cannot decode ${path}: ${detail}`, options)
		this.name = "DecodeError"
		this.path = path
	}
}

/** Disk read or write failure on the snapshot file. */
export class PersistenceError extends LibraryError {
	readonly path: string

	constructor(path: string, action: "read" | "write", cause: unknown) {
		super(
			"PERSISTENCE_FAILED",
			`Failed to ${action} library ${path}: ${errorMessage(cause)}`,
			{ cause },
		)
		this.name = "PersistenceError"
		this.path = path
	}
}

export class TransportError extends LibraryError {
	constructor(message: string, options?: ErrorOptions) {
		super("TRANSPORT_FAILED", message, options)
		this.name = "TransportError"
	}
}

export class FatalStartupError extends LibraryError {
	constructor(message: string, options?: ErrorOptions) {
		super("STARTUP_FAILED", message, options)
		this.name = "FatalStartupError"
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

/** Node system errors carry a string `code` such as ENOENT. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err
}
