import { describe, it, expect } from 'vitest'
import { ProcessTypeFormatter } from './ProcessTypeFormatter.js'

describe('ProcessTypeFormatter', () => {
	describe('toReleaseYaml', () => {
		it('should render nothing for no process types', () => {
			expect(ProcessTypeFormatter.toReleaseYaml(new Map())).toBe('')
		})

		it('should render a single process type', () => {
			const yaml = ProcessTypeFormatter.toReleaseYaml(new Map([['web', 'gunicorn app:app']]))
			expect(yaml).toBe('---\ndefault_process_types:\n  web: gunicorn app:app')
		})

		it('should render process types in map order with unquoted commands', () => {
			const yaml = ProcessTypeFormatter.toReleaseYaml(
				new Map([
					['worker', "dotnet MyApp.dll '--flag value'"],
					['web', 'echo hi && exit 0'],
				])
			)
			expect(yaml.split('\n')).toEqual([
				'---',
				'default_process_types:',
				"  worker: dotnet MyApp.dll '--flag value'",
				'  web: echo hi && exit 0',
			])
		})
	})
})
