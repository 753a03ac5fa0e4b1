#!/usr/bin/env node
/**
 * @fileoverview payprobe entry point.
 */

import 'dotenv/config'
import { createProgram } from './program.js'
import { getErrorMessage, logger } from './utils/index.js'

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(`Run failed: ${getErrorMessage(error)}`)
    process.exitCode = 1
  })
