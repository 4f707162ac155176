#!/usr/bin/env node
import { Command } from 'commander'
import { registerStartCommand } from './commands/start.js'
import { registerInitCommand } from './commands/init.js'
import { registerCheckCommand } from './commands/check.js'
import { output, errorMessage } from './output.js'

const program = new Command()

program
  .name('sre-hello')
  .description('Greeting and health-check HTTP service')
  .version('1.0.0')

registerStartCommand(program)
registerInitCommand(program)
registerCheckCommand(program)

export { program }

program.parseAsync().catch((err: unknown) => {
  output.error(errorMessage(err))
  process.exit(1)
})
