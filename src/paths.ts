/**
 * Per-user locations for the library snapshot
 */

import { homedir } from "node:os"
import { join } from "node:path"

export const APP_DIR_NAME = "romlibd"
export const SNAPSHOT_FILENAME = "library.json"

/**
 * OS-specific per-user configuration directory:
 * %APPDATA% on Windows, ~/Library/Application Support on macOS,
 * $XDG_CONFIG_HOME or ~/.config elsewhere.
 */
export function userConfigDir(
	platform: NodeJS.Platform = process.platform,
	env: NodeJS.ProcessEnv = process.env,
	home: string = homedir(),
): string {
	if (platform === "win32") {
		return env["APPDATA"] || join(home, "AppData", "Roaming")
	}
	if (platform === "darwin") {
		return join(home, "Library", "Application Support")
	}
	return env["XDG_CONFIG_HOME"] || join(home, ".config")
}

/** Default snapshot path: <config dir>/romlibd/library.json */
export function defaultLibraryPath(): string {
	return join(userConfigDir(), APP_DIR_NAME, SNAPSHOT_FILENAME)
}
