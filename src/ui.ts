/**
 * Terminal output helpers with consistent styling
 *
 * Every line is mirrored to pino at debug level so file logs keep the
 * CLI's narrative.
 */

import chalk from "chalk"
import { log } from "./logger.js"

function print(message: string): void {
	log.cli.debug(message)
	console.log(message)
}

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		print(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Success message with checkmark */
	success(text: string): void {
		print(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		log.cli.debug(text)
		console.error(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		print(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		print(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			print(chalk.dim("  → " + text))
		}
	},

	/** Banner for daemon startup */
	banner(version: string, host: string, port: number, libraryPath: string): void {
		console.log(chalk.bold("ROM library daemon") + ` v${version}`)
		console.log(`Listening: ${chalk.cyan(`${host}:${port}`)}`)
		console.log(`Library: ${chalk.cyan(libraryPath)}`)
		console.log()
	},

	/** Name/count table, largest first */
	countTable(title: string, entries: Array<{ name: string; count: number }>): void {
		if (entries.length === 0) return
		console.log(chalk.bold(`${title}:`))
		const width = Math.max(...entries.map(e => e.name.length))
		for (const entry of entries) {
			console.log(`  ${entry.name.padEnd(width)}  ${chalk.cyan(String(entry.count))}`)
		}
	},
}
