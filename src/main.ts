import type { Readable, Writable } from "node:stream"
import type { Logger } from "pino"
import { ConfigError, loadConfig, type AppConfig } from "./config"
import { createLoggers, type Loggers } from "./logger"
import type { FetchLike } from "./services/provider-http"
import { SearchGateway } from "./services/search-gateway"
import { SearxngClient } from "./services/searxng-client"
import { TavilyClient } from "./services/tavily-client"
import { StdioServer } from "./transport/stdio-server"

export interface MainOptions {
  env?: Record<string, string | undefined>
  input: Readable
  output: Writable
  stderr: Writable
  createLoggers?: (config: AppConfig) => Loggers
  fetchImpl?: FetchLike
  onServerReady?: (server: StdioServer) => void
}

export function createGateway(
  config: AppConfig,
  logger: Logger,
  dependencies: { fetchImpl?: FetchLike } = {},
): SearchGateway {
  return new SearchGateway(
    config.gateway,
    {
      searxng: new SearxngClient(config, logger, dependencies),
      tavily: new TavilyClient(config, logger, dependencies),
    },
    logger,
  )
}

/**
 * Loads configuration, then serves line-delimited requests until the input
 * closes. Resolves with the process exit code.
 */
export async function runMain(options: MainOptions): Promise<number> {
  let config: AppConfig
  try {
    config = loadConfig(options.env ?? process.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      options.stderr.write(`metasearch-gateway: ${error.message}\n`)
      return 1
    }
    throw error
  }

  const loggers = (options.createLoggers ?? createLoggers)(config)
  const gateway = createGateway(config, loggers.app, { fetchImpl: options.fetchImpl })
  const server = new StdioServer({ config, loggers, gateway })
  options.onServerReady?.(server)

  const [primary, secondary] = config.gateway.priority
  loggers.app.info(
    {
      mode: config.gateway.mode,
      primary,
      secondary,
      timeoutMs: config.request.timeoutMs,
      retryMax: config.request.retryMax,
    },
    "metasearch-gateway started",
  )

  try {
    await server.serve(options.input, options.output)
  } finally {
    loggers.app.info("metasearch-gateway stopped")
    await loggers.close()
  }

  return 0
}
