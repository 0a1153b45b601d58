import type { AppConfig } from "./config"
import type { Loggers } from "./logger"
import type { SearchGateway } from "./services/search-gateway"

export interface ServerContext {
  config: AppConfig
  loggers: Loggers
  gateway: SearchGateway
}
