// Process types declared in a buildpack launch.toml
export interface ProcessEntry {
	type: string
	command: string
}

/**
 * Process type -> command line, in the order each type was first declared.
 * A type declared twice keeps its first position but takes the later command.
 */
export type ProcessMap = Map<string, string>

// Command inputs
export interface ReleaseCommandInput {
	launchFile: string
}

export interface ProcessCommandInput {
	launchFile: string
	processType: string
}

// Errors
export enum LaunchProcessesErrorCode {
	USAGE = 'USAGE',
	LAUNCH_FILE_NOT_FOUND = 'LAUNCH_FILE_NOT_FOUND',
	PROCESS_TYPE_NOT_FOUND = 'PROCESS_TYPE_NOT_FOUND',
}

export class LaunchProcessesError extends Error {
	constructor(
		public code: LaunchProcessesErrorCode,
		message: string
	) {
		super(message)
		this.name = 'LaunchProcessesError'
	}
}

export class ProcessTypeNotFoundError extends LaunchProcessesError {
	constructor(public processType: string, launchFile: string) {
		super(
			LaunchProcessesErrorCode.PROCESS_TYPE_NOT_FOUND,
			`No command for process type "${processType}" in ${launchFile}`
		)
		this.name = 'ProcessTypeNotFoundError'
	}
}
