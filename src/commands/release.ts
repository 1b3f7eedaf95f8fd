import { LaunchFileParser } from '../lib/LaunchFileParser.js'
import { ProcessTypeFormatter } from '../lib/ProcessTypeFormatter.js'
import type { ProcessMap, ReleaseCommandInput } from '../types/index.js'

export type ProcessLoader = (launchFile: string) => Promise<ProcessMap>

/**
 * ReleaseCommand - prints every process type as a default_process_types YAML document
 * An unreadable launch file or one without process types prints nothing
 */
export class ReleaseCommand {
	constructor(
		private loadProcesses: ProcessLoader = (launchFile) => LaunchFileParser.load(launchFile)
	) {}

	async execute(input: ReleaseCommandInput): Promise<void> {
		const processes = await this.loadProcesses(input.launchFile)
		const yaml = ProcessTypeFormatter.toReleaseYaml(processes)

		if (yaml) {
			// eslint-disable-next-line no-console
			console.log(yaml)
		}
	}
}
