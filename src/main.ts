#!/usr/bin/env node
/**
 * discord-channel-export
 * Main entry point
 */

import { parseCliArgs, USAGE } from './cli/args.js'
import { reportFatal } from './cli/report.js'
import { loadDotenv, loadEnvConfig } from './config/env.js'
import { createRestFetchDeps } from './discord/rest-client.js'
import { runExport } from './export/pipeline.js'
import { describeLimit } from './types.js'
import { logger } from './utils/logger.js'

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2))
  if (args.help) {
    console.log(USAGE)
    return 0
  }

  loadDotenv()
  const env = loadEnvConfig()

  logger.info({
    channelId: env.channelId,
    limit: describeLimit(args.limit),
    output: args.output,
    linksOutput: args.extractLinks ? args.linksOutput : undefined,
  }, 'Starting Discord message export')

  // Ctrl+C stops issuing page requests; a second one kills the process
  const controller = new AbortController()
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current request')
    controller.abort()
  })

  const outcome = await runExport(
    {
      channelId: env.channelId,
      limit: args.limit,
      output: args.output,
      extractLinks: args.extractLinks,
      linksOutput: args.linksOutput,
    },
    {
      api: createRestFetchDeps({ token: env.token, timeoutMs: env.requestTimeoutMs }),
      signal: controller.signal,
    },
  )

  switch (outcome.status) {
    case 'cancelled':
      logger.info({ fetched: outcome.fetched }, 'Operation cancelled by user, nothing written')
      break
    case 'empty':
      break
    case 'complete':
      logger.info({
        messages: outcome.messageCount,
        links: outcome.linkCount,
        files: outcome.files,
      }, 'Done')
      break
  }
  return 0
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    reportFatal(logger, error)
    process.exit(1)
  },
)
