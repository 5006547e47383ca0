/**
 * Vitest Test Setup
 *
 * This file is loaded before all tests run.
 * It registers the custom matchers and resets process-wide state between tests.
 */

import { afterEach, expect } from 'vitest'
import { config } from 'dotenv'
import { geoMatchers } from './matchers'
import { clearConfig } from '../src/config'
import { noopLogger, setLogger } from '../src/utils/logger'

// Load environment variables from .env file
config()

// Register custom matchers
expect.extend(geoMatchers)

// Configuration and logger are process-wide; keep tests independent
afterEach(() => {
  clearConfig()
  setLogger(noopLogger)
})
