export * from './launch.js'
