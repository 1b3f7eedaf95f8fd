import type { ProcessMap } from '../types/index.js'

export const RELEASE_YAML_HEADER = '---'
export const DEFAULT_PROCESS_TYPES_KEY = 'default_process_types'

export class ProcessTypeFormatter {
	/**
	 * Render process types as the `default_process_types` document read from bin/release
	 * Commands are written unquoted, exactly as resolved. No process types renders nothing.
	 */
	static toReleaseYaml(processes: ProcessMap): string {
		if (processes.size === 0) {
			return ''
		}

		const lines = [RELEASE_YAML_HEADER, `${DEFAULT_PROCESS_TYPES_KEY}:`]
		for (const [type, command] of processes) {
			lines.push(`  ${type}: ${command}`)
		}

		return lines.join('\n')
	}
}
