#!/usr/bin/env node
import { run } from './program.js'
import { logger } from './utils/logger.js'

try {
	process.exitCode = await run(process.argv)
} catch (error) {
	logger.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`)
	process.exitCode = 1
}
