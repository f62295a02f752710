#!/usr/bin/env -S node --import tsx
import { errorMessage } from '@tripwire/core'
import { main } from './index.js'

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(`[runtime] ${errorMessage(err)}`)
    process.exitCode = 1
  },
)
