#!/usr/bin/env tsx
/* eslint-disable no-console */
import { run } from './main'

run(process.argv)
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('[fatal]', err)
    process.exit(1)
  })
