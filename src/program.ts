import { Command, CommanderError } from 'commander'
import fs from 'fs-extra'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { ReleaseCommand, ProcessCommand } from './commands/index.js'
import { logger } from './utils/logger.js'
import { LaunchProcessesError, LaunchProcessesErrorCode } from './types/index.js'

// Get package.json for the program description
const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const packageJson = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8')) as {
	description: string
}

export const PROGRAM_NAME = 'launch-processes'
export const USAGE = `Usage: ${PROGRAM_NAME} <launch.toml> [--yaml|--process <type>]`
export const DEBUG_ENV_VAR = 'LAUNCH_PROCESSES_DEBUG'

export type Invocation =
	| { mode: 'yaml'; launchFile: string }
	| { mode: 'process'; launchFile: string; processType: string }

function printUsage(): number {
	logger.error(USAGE)
	return 1
}

/**
 * Build the commander program
 *
 * The grammar is positional: the launch file first, then the mode token, then
 * the process type. Option-like arguments are passed through as operands and
 * help is off, so `--yaml` and `--process` are only recognised in mode position.
 * Parse errors throw instead of exiting.
 */
export function createProgram(onInvocation: (invocation: Invocation) => void): Command {
	return new Command()
		.name(PROGRAM_NAME)
		.description(packageJson.description)
		.helpOption(false)
		.passThroughOptions()
		.allowUnknownOption()
		.exitOverride()
		.configureOutput({
			writeOut: () => {},
			writeErr: () => {},
			outputError: () => {},
		})
		.argument('<launch-file>', 'Path to the buildpack launch.toml')
		.argument('<mode>', '--yaml or --process')
		.argument('[type]', 'Process type, with --process')
		.action((launchFile: string, mode: string, processType: string | undefined) => {
			if (mode === '--yaml') {
				onInvocation({ launchFile, mode: 'yaml' })
			} else if (mode === '--process' && processType !== undefined) {
				onInvocation({ launchFile, mode: 'process', processType })
			} else {
				throw new LaunchProcessesError(
					LaunchProcessesErrorCode.USAGE,
					`Unexpected mode: ${mode}`
				)
			}
		})
}

function parseInvocation(argv: string[]): Invocation {
	const parsed: { invocation?: Invocation } = {}
	const program = createProgram((invocation) => {
		parsed.invocation = invocation
	})

	program.parse(argv, { from: 'node' })

	if (!parsed.invocation) {
		throw new LaunchProcessesError(LaunchProcessesErrorCode.USAGE, 'No mode selected')
	}
	return parsed.invocation
}

async function assertLaunchFileExists(launchFile: string): Promise<void> {
	if (!(await fs.pathExists(launchFile))) {
		throw new LaunchProcessesError(
			LaunchProcessesErrorCode.LAUNCH_FILE_NOT_FOUND,
			`Launch file not found: ${launchFile}`
		)
	}
}

async function execute(invocation: Invocation): Promise<void> {
	if (invocation.mode === 'yaml') {
		await new ReleaseCommand().execute({ launchFile: invocation.launchFile })
		return
	}

	await new ProcessCommand().execute({
		launchFile: invocation.launchFile,
		processType: invocation.processType,
	})
}

/**
 * Run the CLI against a full argv (node binary and script path first)
 *
 * A missing launch file exits 1 before the mode is looked at.
 * @returns Process exit status
 */
export async function run(argv: string[] = process.argv): Promise<number> {
	logger.setDebug(process.env[DEBUG_ENV_VAR] === 'true')

	const args = argv.slice(2)
	const [launchFile] = args
	if (launchFile === undefined || (args.length !== 2 && args.length !== 3)) {
		return printUsage()
	}

	try {
		await assertLaunchFileExists(launchFile)
		await execute(parseInvocation(argv))
		return 0
	} catch (error) {
		if (error instanceof CommanderError) {
			return printUsage()
		}
		if (error instanceof LaunchProcessesError) {
			if (error.code === LaunchProcessesErrorCode.USAGE) {
				return printUsage()
			}
			// Missing files and unknown process types exit quietly
			logger.debug(error.message)
			return 1
		}
		logger.error(`Failed to read process types: ${error instanceof Error ? error.message : 'Unknown error'}`)
		return 1
	}
}
