import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { quoteShellArg, joinShellArgs } from './shell.js'
import { splitShellWords } from '../test-utils/shell-words.js'

describe('quoteShellArg', () => {
	it('should leave simple words unquoted', () => {
		expect(quoteShellArg('dotnet')).toBe('dotnet')
		expect(quoteShellArg('MyApp.dll')).toBe('MyApp.dll')
		expect(quoteShellArg('--port=8080')).toBe('--port=8080')
		expect(quoteShellArg('app:app')).toBe('app:app')
		expect(quoteShellArg('user@host:/srv/app,v2%+')).toBe('user@host:/srv/app,v2%+')
	})

	it('should quote the empty word', () => {
		expect(quoteShellArg('')).toBe("''")
	})

	it('should single-quote words with whitespace', () => {
		expect(quoteShellArg('--flag value')).toBe("'--flag value'")
	})

	it('should single-quote words with shell metacharacters', () => {
		expect(quoteShellArg('$HOME')).toBe("'$HOME'")
		expect(quoteShellArg('a&&b')).toBe("'a&&b'")
		expect(quoteShellArg('*.log')).toBe("'*.log'")
		expect(quoteShellArg('say "hi"')).toBe(`'say "hi"'`)
	})

	it('should escape embedded single quotes', () => {
		expect(quoteShellArg("it's")).toBe(`'it'"'"'s'`)
	})

	it('should quote non-ASCII words', () => {
		expect(quoteShellArg('café')).toBe("'café'")
	})
})

describe('joinShellArgs', () => {
	it('should join words with single spaces', () => {
		expect(joinShellArgs(['gunicorn', 'app:app'])).toBe('gunicorn app:app')
	})

	it('should quote only the words that need it', () => {
		expect(joinShellArgs(['dotnet', 'MyApp.dll', '--flag value'])).toBe(
			"dotnet MyApp.dll '--flag value'"
		)
	})

	it('should return an empty string for no words', () => {
		expect(joinShellArgs([])).toBe('')
	})

	it('should split back into the original words', () => {
		const words = ['dotnet', 'MyApp.dll', '--flag value']
		expect(splitShellWords(joinShellArgs(words))).toEqual(words)
	})

	it('should split back into the original words for arbitrary input', () => {
		fc.assert(
			fc.property(fc.array(fc.string(), { minLength: 1, maxLength: 8 }), (words) => {
				expect(splitShellWords(joinShellArgs(words))).toEqual(words)
			}),
			{ numRuns: 200 }
		)
	})
})
