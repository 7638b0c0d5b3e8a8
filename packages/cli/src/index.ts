#!/usr/bin/env tsx

import 'dotenv/config'
import { Command } from 'commander'
import { askCommand } from './commands/ask.js'
import { chatCommand } from './commands/chat.js'
import { statusCommand } from './commands/status.js'

const program = new Command()

program.name('ragbridge').description('ragbridge CLI - Ask questions about a document, grounded in the web').version('0.1.0')
program.addCommand(askCommand)
program.addCommand(chatCommand)
program.addCommand(statusCommand)
await program.parseAsync()
