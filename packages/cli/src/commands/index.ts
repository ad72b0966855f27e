/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/helmsman.ts  (the `helmsman` executable)
 *   src/index.ts         (library entry)
 */

import { Command } from 'commander'
import { statusCommand } from './status.js'
import { haltCommand, resumeCommand } from './halt.js'
import { submitCommand } from './submit.js'
import { escalationsCommand } from './escalations.js'
import { recordsCommand } from './records.js'
import { pathsCommand } from './paths.js'
import { logCommand } from './log.js'
import { runCommand } from './run.js'

export const program = new Command()

program
  .name('helmsman')
  .description(
    'helmsman — governance for autonomous infrastructure actions.\n' +
    'Every action passes the safety governor; failures cascade into a halt\n' +
    'that only an operator can clear.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'State directory (default: $HELMSMAN_HOME or ~/.helmsman)')
  .option('--log-level <level>', 'Operational log level (default: $HELMSMAN_LOG_LEVEL or info)')

program.addCommand(statusCommand)
program.addCommand(haltCommand)
program.addCommand(resumeCommand)
program.addCommand(submitCommand)
program.addCommand(escalationsCommand)
program.addCommand(recordsCommand)
program.addCommand(pathsCommand)
program.addCommand(logCommand)
program.addCommand(runCommand)
