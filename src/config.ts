/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { DEFAULT_PORT } from "./ipc/protocol.js"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"

/** The daemon trusts every local client, so it never listens off-host. */
export const LOOPBACK_HOSTS = ["127.0.0.1", "::1", "localhost"] as const

const ConfigSchema = z.object({
	port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
	host: z.enum(LOOPBACK_HOSTS).default("127.0.0.1"),
	/** Snapshot file; defaults to the per-user config directory */
	libraryPath: z.string().min(1).optional(),
	/** Directories registered at startup, in addition to saved ones */
	scanPaths: z.array(z.string().min(1)).default([]),
	/** Rescan once the snapshot is loaded */
	scanOnStart: z.boolean().default(false),
})

export type Config = z.infer<typeof ConfigSchema>

const DEFAULT_CONFIG: Config = {
	port: DEFAULT_PORT,
	host: "127.0.0.1",
	scanPaths: [],
	scanOnStart: false,
}

export function configSearchPaths(
	cwd: string = process.cwd(),
	home: string = homedir(),
): string[] {
	return [
		join(cwd, ".romlibdrc"),
		join(cwd, ".romlibdrc.json"),
		join(home, ".romlibdrc"),
		join(home, ".romlibdrc.json"),
	]
}

/**
 * Parse raw config JSON. Throws a ZodError on bad values.
 */
export function parseConfig(raw: unknown): Config {
	return ConfigSchema.parse(raw)
}

/**
 * Apply ROMLIBD_PORT / ROMLIBD_LIBRARY. A non-numeric port is ignored with
 * a warning.
 */
export function applyEnvOverrides(
	config: Config,
	env: NodeJS.ProcessEnv = process.env,
): Config {
	const next: Config = { ...config }

	const port = env["ROMLIBD_PORT"]
	if (port !== undefined && port !== "") {
		const parsed = ConfigSchema.shape.port.safeParse(Number(port))
		if (parsed.success) {
			next.port = parsed.data
		} else {
			log.config.warn({ value: port }, "ignoring invalid ROMLIBD_PORT")
		}
	}

	const library = env["ROMLIBD_LIBRARY"]
	if (library) {
		next.libraryPath = library
	}

	return next
}

/**
 * Load configuration from .romlibdrc (JSON format)
 * Checks current directory first, then home directory. The first readable,
 * valid file wins; environment overrides apply on top.
 */
export function loadConfig(
	paths: string[] = configSearchPaths(),
	env: NodeJS.ProcessEnv = process.env,
): Config {
	for (const path of paths) {
		if (!existsSync(path)) continue
		try {
			const raw = readFileSync(path, "utf-8")
			const parsed = parseConfig(JSON.parse(raw) as unknown)
			log.config.debug({ path }, "config loaded")
			return applyEnvOverrides(parsed, env)
		} catch (err) {
			// Continue to next path if invalid
			log.config.warn({ path, error: errorMessage(err) }, "skipping invalid config file")
		}
	}

	return applyEnvOverrides(DEFAULT_CONFIG, env)
}

export { DEFAULT_CONFIG }
