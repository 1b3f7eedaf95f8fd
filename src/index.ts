export { LaunchFileParser, PROCESS_MARKER } from './lib/LaunchFileParser.js'
export { ProcessTypeFormatter } from './lib/ProcessTypeFormatter.js'
export { quoteShellArg, joinShellArgs } from './utils/shell.js'
export { ReleaseCommand, ProcessCommand } from './commands/index.js'
export { run } from './program.js'
export * from './types/index.js'
