import { LaunchFileParser } from '../lib/LaunchFileParser.js'
import { ProcessTypeNotFoundError } from '../types/index.js'
import type { ProcessCommandInput } from '../types/index.js'
import type { ProcessLoader } from './release.js'

/**
 * ProcessCommand - prints the command line of a single process type
 */
export class ProcessCommand {
	constructor(
		private loadProcesses: ProcessLoader = (launchFile) => LaunchFileParser.load(launchFile)
	) {}

	/**
	 * @throws ProcessTypeNotFoundError when the type is undeclared or resolves to an empty command
	 */
	async execute(input: ProcessCommandInput): Promise<void> {
		const processes = await this.loadProcesses(input.launchFile)
		const command = processes.get(input.processType)

		if (!command) {
			throw new ProcessTypeNotFoundError(input.processType, input.launchFile)
		}

		// eslint-disable-next-line no-console
		console.log(command)
	}
}
