/**
 * Command line
 *
 *   demo work [--steps 10] [--step-ms 250] [--cancel-after ms]
 *   demo list <dir> [<dir>...]
 *   demo primes [--limit 2000000] [--cancel-after ms]
 */

import yargs from 'yargs'
import { z } from 'zod'

const cancelAfter = z.number().int().nonnegative().optional()

export const demoCommandSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('work'),
    steps: z.number().int().positive().default(10),
    stepMs: z.number().int().nonnegative().default(250),
    cancelAfter,
  }),
  z.object({
    command: z.literal('list'),
    paths: z.array(z.string().min(1)).min(1),
  }),
  z.object({
    command: z.literal('primes'),
    limit: z.number().int().min(2).default(2_000_000),
    cancelAfter,
  }),
])

export type DemoCommand = z.infer<typeof demoCommandSchema>

/**
 * Parse argv (without the node and script entries).
 * Throws on unknown commands or options instead of exiting.
 */
export function parseCommand(argv: Array<string>): DemoCommand {
  const args = yargs(argv)
    .scriptName('demo')
    .usage('Run background work against the offload engine')
    .command(['work', '$0'], 'Stepped job with progress and a cancel button')
    .command('list <paths..>', 'List folders, each load replacing the previous one')
    .command('primes', 'Count primes on a worker thread')
    .option('steps', { type: 'number', describe: 'Number of steps' })
    .option('step-ms', { type: 'number', describe: 'Milliseconds per step' })
    .option('cancel-after', {
      type: 'number',
      describe: 'Cancel after this many milliseconds',
    })
    .option('limit', { type: 'number', describe: 'Count primes up to this number' })
    .example('$0 work --cancel-after 1000', 'Cancel the stepped job after a second')
    .example('$0 list ~/Documents ~/Pictures', 'The second listing supersedes the first')
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message)
    })
    .help()
    .parseSync()

  const [command = 'work'] = args._

  return demoCommandSchema.parse({
    command: String(command),
    paths: args.paths,
    steps: args.steps,
    stepMs: args['step-ms'],
    cancelAfter: args['cancel-after'],
    limit: args.limit,
  })
}
