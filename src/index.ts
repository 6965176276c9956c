#!/usr/bin/env node

import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
// Load environment variables from .env file
import { config } from 'dotenv'
import { runCli } from './interfaces/cli/run.js'
import { defaultIO } from './interfaces/cli/io.js'

config({ quiet: true })

process.exitCode = await runCli({
  argv: process.argv.slice(2),
  anchorDir: dirname(fileURLToPath(import.meta.url)),
  cwd: process.cwd(),
  env: process.env,
  io: defaultIO()
})
