import { describe, it, expect, vi, beforeEach, type MockInstance } from 'vitest'
import { ProcessCommand } from './process.js'
import { LaunchProcessesErrorCode, ProcessTypeNotFoundError } from '../types/index.js'
import type { ProcessMap } from '../types/index.js'

describe('ProcessCommand', () => {
	let stdoutSpy: MockInstance
	const processes: ProcessMap = new Map([
		['web', 'echo hi && exit 0'],
		['blank', ''],
	])

	beforeEach(() => {
		stdoutSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
	})

	it('should print the command of the requested process type', async () => {
		const command = new ProcessCommand(async () => processes)

		await command.execute({ launchFile: 'launch.toml', processType: 'web' })

		expect(stdoutSpy).toHaveBeenCalledOnce()
		expect(stdoutSpy).toHaveBeenCalledWith('echo hi && exit 0')
	})

	it('should throw ProcessTypeNotFoundError for an undeclared type', async () => {
		const command = new ProcessCommand(async () => processes)

		const result = command.execute({ launchFile: 'launch.toml', processType: 'missing' })

		await expect(result).rejects.toBeInstanceOf(ProcessTypeNotFoundError)
		await expect(result).rejects.toThrow('No command for process type "missing" in launch.toml')
		await expect(result).rejects.toHaveProperty('code', LaunchProcessesErrorCode.PROCESS_TYPE_NOT_FOUND)
		await expect(result).rejects.toHaveProperty('processType', 'missing')
		expect(stdoutSpy).not.toHaveBeenCalled()
	})

	it('should treat an empty command as not found', async () => {
		const command = new ProcessCommand(async () => processes)

		await expect(
			command.execute({ launchFile: 'launch.toml', processType: 'blank' })
		).rejects.toBeInstanceOf(ProcessTypeNotFoundError)
		expect(stdoutSpy).not.toHaveBeenCalled()
	})
})
