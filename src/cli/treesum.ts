#!/usr/bin/env node

import { run } from './run'

// Only run if this is the main module
if (require.main === module) {
  // First Ctrl-C stops admitting files and lets the manifest close cleanly;
  // a second one falls through to the default handler
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())

  run(process.argv.slice(2), { signal: controller.signal })
    .then((exitCode) => {
      process.exitCode = exitCode
    })
    .catch((error: unknown) => {
      console.error('treesum: unexpected failure:', error)
      process.exitCode = 1
    })
}
