/**
 * Logging utility with context support
 * Outputs structured JSON lines through the console
 *
 * Usage:
 *   import { logger } from "@/lib/logger"
 *
 *   logger.info("Library loaded", { templateCount: 3 })
 *   logger.error("Failed to write library", error, { path })
 *
 *   // With context
 *   const log = logger.child({ service: "ComputedChannelLibrary" })
 *   log.warn("Library file is corrupt", { path })
 */

type LogLevel = "info" | "warn" | "error" | "debug"

export interface LogContext {
  service?: string
  operation?: string
  templateId?: string
  duration?: number
  [key: string]: unknown
}

interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  service?: string
  operation?: string
  templateId?: string
  duration?: number
  data?: unknown
  error?: {
    name: string
    message: string
    stack?: string
  }
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  data?: unknown,
  error?: Error
): LogEntry {
  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
  }

  // Add context fields
  if (context) {
    if (context.service) entry.service = context.service
    if (context.operation) entry.operation = context.operation
    if (context.templateId) entry.templateId = context.templateId
    if (context.duration !== undefined) entry.duration = context.duration
  }

  if (data !== undefined) {
    entry.data = data
  }

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return entry
}

export interface Logger {
  info(message: string, data?: unknown, context?: LogContext): void
  warn(message: string, data?: unknown, context?: LogContext): void
  error(message: string, error?: unknown, data?: unknown, context?: LogContext): void
  debug(message: string, data?: unknown, context?: LogContext): void
  child(childContext: LogContext): Logger
}

function createLogger(baseContext?: LogContext): Logger {
  return {
    info(message, data, context) {
      const entry = formatLogEntry("info", message, { ...baseContext, ...context }, data)
      console.log(JSON.stringify(entry))
    },

    warn(message, data, context) {
      const entry = formatLogEntry("warn", message, { ...baseContext, ...context }, data)
      console.warn(JSON.stringify(entry))
    },

    /**
     * Non-Error values are wrapped so the entry always carries name and message
     */
    error(message, error, data, context) {
      const err = error instanceof Error ? error : error ? new Error(String(error)) : undefined
      const entry = formatLogEntry("error", message, { ...baseContext, ...context }, data, err)
      console.error(JSON.stringify(entry))
    },

    /**
     * Only emitted in development
     */
    debug(message, data, context) {
      if (process.env.NODE_ENV === "development") {
        const entry = formatLogEntry("debug", message, { ...baseContext, ...context }, data)
        console.log(JSON.stringify(entry))
      }
    },

    child(childContext) {
      return createLogger({ ...baseContext, ...childContext })
    },
  }
}

// Export the default logger instance
export const logger = createLogger()

export { createLogger }
