#!/usr/bin/env node
/**
 * @ctv-audit/cli
 *
 * Command-line interface for CRAN Task View compliance audits.
 */

import { Command } from 'commander'
import { VERSION } from '@ctv-audit/core'
import { createAuditCommand, createChecksCommand, createPackagesCommand } from './commands/index.js'

const program = new Command()

program
  .name('ctv-audit')
  .description('Score the packages of a CRAN Task View against engineering best practices')
  .version(VERSION)

program.addCommand(createAuditCommand())
program.addCommand(createPackagesCommand())
program.addCommand(createChecksCommand())

await program.parseAsync()
