import fs from 'fs-extra'
import { joinShellArgs } from '../utils/shell.js'
import { createLogger } from '../utils/logger.js'
import type { ProcessEntry, ProcessMap } from '../types/index.js'

const logger = createLogger({ prefix: 'parser' })

export const PROCESS_MARKER = '[[processes]]'

const TYPE_PATTERN = /type\s*=\s*["']([^"']+)["']/
// Non-greedy up to the first closing bracket, across lines
const COMMAND_PATTERN = /command\s*=\s*\[(.*?)\]/s
const STRING_LITERAL_PATTERN = /["']([^"']*)["']/g

/**
 * Pattern-based reader for the `[[processes]]` tables of a buildpack launch.toml
 *
 * Deliberately not a TOML parser: each block is searched for the first textual
 * `type = "..."` and `command = [...]`, wherever they appear in the block.
 */
export class LaunchFileParser {
	/**
	 * Split launch.toml content into the raw text following each `[[processes]]` marker
	 * Text before the first marker is dropped
	 */
	static *splitBlocks(content: string): Generator<string> {
		let markerIndex = content.indexOf(PROCESS_MARKER)

		while (markerIndex !== -1) {
			const blockStart = markerIndex + PROCESS_MARKER.length
			const nextMarker = content.indexOf(PROCESS_MARKER, blockStart)

			yield nextMarker === -1
				? content.slice(blockStart)
				: content.slice(blockStart, nextMarker)

			markerIndex = nextMarker
		}
	}

	/**
	 * Extract the process type and command line from one block
	 *
	 * `["bash", "-c", script, ...]` resolves to the script itself, any other
	 * array is re-quoted into a single shell command line.
	 *
	 * @returns null when the block has no type, no command array, or an empty one
	 */
	static parseBlock(block: string): ProcessEntry | null {
		const typeMatch = TYPE_PATTERN.exec(block)
		const type = typeMatch?.[1]
		if (!type) {
			return null
		}

		const commandMatch = COMMAND_PATTERN.exec(block)
		const commandBody = commandMatch?.[1]
		if (commandBody === undefined) {
			logger.debug(`Skipping process type "${type}": no command array`)
			return null
		}

		const parts = this.extractStringLiterals(commandBody)
		if (parts.length === 0) {
			logger.debug(`Skipping process type "${type}": empty command array`)
			return null
		}

		const [first, second, script] = parts
		if (first === 'bash' && second === '-c' && script !== undefined) {
			return { type, command: script }
		}

		return { type, command: joinShellArgs(parts) }
	}

	/**
	 * Build the process type map for a whole launch.toml
	 * Later declarations of a type replace earlier ones
	 */
	static parse(content: string): ProcessMap {
		const processes: ProcessMap = new Map()

		for (const block of this.splitBlocks(content)) {
			const entry = this.parseBlock(block)
			if (entry) {
				processes.set(entry.type, entry.command)
			}
		}

		return processes
	}

	/**
	 * Read and parse a launch.toml
	 * A file that cannot be read yields no process types
	 */
	static async load(launchFile: string): Promise<ProcessMap> {
		let content: string
		try {
			content = await fs.readFile(launchFile, 'utf8')
		} catch (error) {
			logger.debug(
				`Could not read ${launchFile}: ${error instanceof Error ? error.message : 'Unknown error'}`
			)
			return new Map()
		}

		const processes = this.parse(content)
		logger.debug(`Found ${processes.size} process type(s) in ${launchFile}`)
		return processes
	}

	private static extractStringLiterals(commandBody: string): string[] {
		const literals: string[] = []
		for (const match of commandBody.matchAll(STRING_LITERAL_PATTERN)) {
			literals.push(match[1] ?? '')
		}
		return literals
	}
}
