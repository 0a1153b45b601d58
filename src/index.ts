import "dotenv/config"
import { runMain } from "./main"

runMain({
  input: process.stdin,
  output: process.stdout,
  stderr: process.stderr,
  onServerReady: (server) => {
    const shutdown = () => server.close()

    process.once("SIGINT", shutdown)
    process.once("SIGTERM", shutdown)
  },
}).then(
  (exitCode) => {
    process.exit(exitCode)
  },
  (error: unknown) => {
    console.error("Fatal error:", error)
    process.exit(1)
  },
)
