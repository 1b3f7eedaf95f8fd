// Words made only of these characters need no quoting in a POSIX shell
const SAFE_WORD = /^[\w@%+=:,./-]+$/

/**
 * Quote a single word so a POSIX shell reads it back unchanged
 * Safe words pass through, everything else is single-quoted
 */
export function quoteShellArg(word: string): string {
	if (word === '') {
		return "''"
	}

	if (SAFE_WORD.test(word)) {
		return word
	}

	// A single quote cannot appear inside '...', so close, emit "'" and reopen
	return `'${word.replace(/'/g, `'"'"'`)}'`
}

/**
 * Join words into one command line that splits back into the same words
 *
 * @example
 * joinShellArgs(['dotnet', 'MyApp.dll', '--flag value'])
 * // => "dotnet MyApp.dll '--flag value'"
 */
export function joinShellArgs(words: readonly string[]): string {
	return words.map(quoteShellArg).join(' ')
}
