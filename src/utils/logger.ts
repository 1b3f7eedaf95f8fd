import chalk, { Chalk } from 'chalk'

export interface LoggerOptions {
	prefix?: string
}

export interface Logger {
	error: (message: string, ...args: unknown[]) => void
	debug: (message: string, ...args: unknown[]) => void
	setDebug: (enabled: boolean) => void
}

export type ScopedLogger = Pick<Logger, 'debug'>

// stdout carries the YAML document or the command line, so every level goes to stderr
const stderrChalk = new Chalk({ level: chalk.level })

function formatMessage(message: string, ...args: unknown[]): string {
	const formattedArgs = args.map(arg =>
		typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
	)
	return formattedArgs.length > 0 ? `${message} ${formattedArgs.join(' ')}` : message
}

function formatWithEmoji(message: string, emoji: string, colorFn: (str: string) => string): string {
	if (message.trim()) {
		return colorFn(`${emoji} ${message}`)
	} else {
		return ''
	}
}

let globalDebugEnabled = false

/* eslint-disable no-console */
export const logger: Logger = {
	error: (message: string, ...args: unknown[]): void => {
		const formatted = formatMessage(message, ...args)
		console.error(formatWithEmoji(formatted, '❌', stderrChalk.red))
	},

	debug: (message: string, ...args: unknown[]): void => {
		if (globalDebugEnabled) {
			const formatted = formatMessage(message, ...args)
			console.error(formatWithEmoji(formatted, '🔍', stderrChalk.gray))
		}
	},

	setDebug: (enabled: boolean): void => {
		globalDebugEnabled = enabled
	},
}
/* eslint-enable no-console */

/**
 * Create a logger that prefixes every message, gated by the global debug flag
 */
export function createLogger(options: LoggerOptions = {}): ScopedLogger {
	const prefixStr = options.prefix ? `[${options.prefix}] ` : ''

	return {
		debug: (message: string, ...args: unknown[]): void => {
			logger.debug(`${prefixStr}${message}`, ...args)
		},
	}
}
