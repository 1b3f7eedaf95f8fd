import { beforeEach, vi } from 'vitest'
import { logger } from '../utils/logger.js'

// Global test setup
beforeEach(() => {
  vi.clearAllMocks()
  vi.resetAllMocks()
  vi.restoreAllMocks()

  delete process.env.LAUNCH_PROCESSES_DEBUG
  logger.setDebug(false)
})
