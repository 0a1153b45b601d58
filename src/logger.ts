import { mkdirSync } from "node:fs"
import { resolve } from "node:path"
import pino from "pino"
import { createStream, type RotatingFileStream } from "rotating-file-stream"
import type { AppConfig } from "./config"

export interface Loggers {
  app: pino.Logger
  search: pino.Logger
  close(): Promise<void>
}

export function createLoggers(config: AppConfig): Loggers {
  const resolvedLogDir = resolve(config.logDir)
  mkdirSync(resolvedLogDir, { recursive: true })

  const appStream = createStream("app.log", {
    interval: "1d",
    size: "10M",
    rotate: 30,
    path: resolvedLogDir,
    compress: "gzip",
  })

  const searchStream = createStream("search.log", {
    interval: "1d",
    size: "10M",
    rotate: 14,
    path: resolvedLogDir,
    compress: "gzip",
  })

  const app = pino(
    {
      level: config.logLevel,
      base: {
        service: "metasearch-gateway",
        mode: config.gateway.mode,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    appStream,
  )

  const search = pino(
    {
      level: config.logLevel,
      base: {
        service: "metasearch-gateway-search",
        mode: config.gateway.mode,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    searchStream,
  )

  return {
    app,
    search,
    close: async () => {
      await Promise.all([endStream(appStream), endStream(searchStream)])
    },
  }
}

function endStream(stream: RotatingFileStream): Promise<void> {
  return new Promise((resolveEnd) => {
    stream.end(() => resolveEnd())
  })
}
