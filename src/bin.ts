#!/usr/bin/env node
import { main } from './cli.js'

main(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  isTTY: process.stdout.isTTY,
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  })
