import { env } from "node:process"
import pino, { type Logger } from "pino"

/**
 * Shared logger for the compiler. Hosts can pass their own pino instance through
 * `CompileOptions.logger`; otherwise the level comes from LOG_LEVEL.
 */
export const log: Logger = pino({ name: "factory-query", level: env.LOG_LEVEL || "info" })

export type { Logger }
