#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CheckCommand from './commands/check.ts'
import { usageLines } from './utils.ts'

const BINARY = 'javalite'
const VERSION = '0.1.0'

function createKernel() {
	const kernel = Kernel.create()
	kernel.info.set('binary', BINARY)
	kernel.info.set('version', VERSION)

	kernel.defineFlag('help', { alias: 'h', description: 'Display help information', type: 'boolean' })
	kernel.defineFlag('version', { alias: 'v', description: 'Display version number', type: 'boolean' })
	kernel.addLoader(new ListLoader([CheckCommand, HelpCommand]))

	// Command name did not resolve: print the banner
	kernel.on('finding:command', async () => {
		process.stdout.write(`${usageLines(BINARY, VERSION).join('\n')}\n`)
		return true
	})
	return kernel
}

createKernel()
	.handle(process.argv.slice(2))
	.catch((error: unknown) => {
		console.error(error)
		process.exit(1)
	})
