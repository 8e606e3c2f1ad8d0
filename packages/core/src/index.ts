#!/usr/bin/env node
import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import { createCalendarRuntime } from './calendar/runtime.js'
import { AmbiguousError, errorMessage } from './calendar/errors.js'
import type { ScheduleCoordinator } from './calendar/coordinator.js'
import { USAGE, commandToRequest } from './cli.js'

function describeError(err: unknown): string {
  if (err instanceof AmbiguousError) {
    return err.message
  }
  return `Error: ${errorMessage(err)}`
}

async function run(coordinator: ScheduleCoordinator, request: unknown): Promise<boolean> {
  try {
    const result = await coordinator.handle(request)
    console.log(result.text)
    return true
  } catch (err) {
    console.error(describeError(err))
    return false
  }
}

async function singleShot(args: string[]): Promise<void> {
  const request = commandToRequest(args)
  if (!request) {
    console.log(USAGE)
    process.exit(1)
  }

  const { coordinator } = createCalendarRuntime()
  const ok = await run(coordinator, request)
  if (!ok) process.exit(1)
}

async function repl(): Promise<void> {
  const { coordinator } = createCalendarRuntime()
  const rl = readline.createInterface({ input, output })

  try {
    console.log('Calendar REPL started. One JSON request per line, "exit" or Ctrl+C to quit.\n')

    while (true) {
      const line = (await rl.question('> ')).trim()
      if (line.toLowerCase() === 'exit') break
      if (!line) continue

      let request: unknown
      if (line.startsWith('{')) {
        try {
          request = JSON.parse(line)
        } catch (err) {
          console.error(`Error: not valid JSON (${errorMessage(err)})`)
          continue
        }
      } else {
        request = commandToRequest(line.split(/\s+/))
        if (!request) {
          console.log(USAGE)
          continue
        }
      }

      await run(coordinator, request)
      console.log()
    }
  } finally {
    rl.close()
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)

  if (args.length > 0) {
    await singleShot(args)
  } else {
    await repl()
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
