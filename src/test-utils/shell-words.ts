/**
 * POSIX shell word splitting (quotes and backslashes only, no expansions)
 * Used by tests to check that quoted command lines read back as the original words
 */
export function splitShellWords(line: string): string[] {
	const words: string[] = []
	let current = ''
	let inWord = false
	let i = 0

	while (i < line.length) {
		const ch = line.charAt(i)

		if (ch === ' ' || ch === '\t' || ch === '\n') {
			if (inWord) {
				words.push(current)
				current = ''
				inWord = false
			}
			i += 1
			continue
		}

		inWord = true

		if (ch === "'") {
			const end = line.indexOf("'", i + 1)
			if (end === -1) {
				throw new Error(`Unterminated single quote at ${i}`)
			}
			current += line.slice(i + 1, end)
			i = end + 1
			continue
		}

		if (ch === '"') {
			i += 1
			while (i < line.length && line.charAt(i) !== '"') {
				const inner = line.charAt(i)
				const next = line.charAt(i + 1)
				if (inner === '\\' && '$`"\\\n'.includes(next) && next !== '') {
					current += next
					i += 2
					continue
				}
				current += inner
				i += 1
			}
			if (i >= line.length) {
				throw new Error('Unterminated double quote')
			}
			i += 1
			continue
		}

		if (ch === '\\' && i + 1 < line.length) {
			current += line.charAt(i + 1)
			i += 2
			continue
		}

		current += ch
		i += 1
	}

	if (inWord) {
		words.push(current)
	}

	return words
}
