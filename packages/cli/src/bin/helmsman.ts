#!/usr/bin/env -S node --import tsx
/**
 * bin/helmsman.ts — entry point for the `helmsman` command.
 *
 * helmsman --help        → command overview
 * helmsman run           → observe-decide-act loop until SIGINT
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
