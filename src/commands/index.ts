export { ReleaseCommand } from './release.js'
export type { ProcessLoader } from './release.js'

export { ProcessCommand } from './process.js'
