import { describe, it, expect } from "vitest"
import { userConfigDir } from "../../src/paths.js"

describe("userConfigDir", () => {
	it("uses XDG_CONFIG_HOME on Linux when set", () => {
		expect(userConfigDir("linux", { XDG_CONFIG_HOME: "/xdg" }, "/home/u")).toBe("/xdg")
	})

	it("falls back to ~/.config on Linux", () => {
		expect(userConfigDir("linux", {}, "/home/u")).toBe("/home/u/.config")
		expect(userConfigDir("linux", { XDG_CONFIG_HOME: "" }, "/home/u")).toBe("/home/u/.config")
	})

	it("uses Application Support on macOS", () => {
		expect(userConfigDir("darwin", { XDG_CONFIG_HOME: "/xdg" }, "/Users/u")).toBe(
			"/Users/u/Library/Application Support",
		)
	})

	it("uses APPDATA on Windows", () => {
		expect(userConfigDir("win32", { APPDATA: "C:\\Users\\u\\AppData\\Roaming" }, "/h")).toBe(
			"C:\\Users\\u\\AppData\\Roaming",
		)
	})
})
