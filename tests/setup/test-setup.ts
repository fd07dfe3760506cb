// Global test setup for the Node test runner (loaded through tsx)
// - Configures logger to reduce noise

import { Logger } from '../../src/utils/logger.js'

// Quiet logs during tests unless DEBUG is set
Logger.configure({ level: process.env.DEBUG ? 'debug' : 'error', json: false })

process.env.NODE_ENV = process.env.NODE_ENV || 'test'

// Export nothing; imported by tests as side-effect
export {}
