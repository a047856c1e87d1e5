/**
 * Logging Module
 *
 * Two targets with separate levels: pretty console output and a JSON lines file.
 * Uses Effect's Logger module with @effect/platform for file logging.
 */
import { FileSystem, PlatformLogger } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { Console, Effect, Layer, Logger, LogLevel, Option } from "effect"
import * as Path from "node:path"
import { type IterationEngineConfig, resolveBaseDir } from "./config.ts"

// =============================================================================
// Logging Configuration
// =============================================================================

export interface LoggingConfig {
  readonly stdoutLevel: LogLevel.LogLevel
  readonly fileLogPath: Option.Option<string>
  readonly fileLogLevel: LogLevel.LogLevel
  /** Relative file paths resolve against this directory */
  readonly baseDir: string
}

export const loggingConfigFrom = (config: IterationEngineConfig): LoggingConfig => ({
  stdoutLevel: config.stdoutLogLevel,
  fileLogPath: config.logFile === "" ? Option.none() : Option.some(config.logFile),
  fileLogLevel: config.fileLogLevel,
  baseDir: resolveBaseDir(config)
})

// =============================================================================
// Logger Creation
// =============================================================================

const atLeast = <M, O>(logger: Logger.Logger<M, O>, minimum: LogLevel.LogLevel) =>
  Logger.filterLogLevel(logger, (level) => LogLevel.greaterThanEqual(level, minimum))

const consoleLogger = (level: LogLevel.LogLevel) =>
  level === LogLevel.None ? Logger.none : atLeast(Logger.prettyLoggerDefault, level)

/** Batched JSON logger appending to `filePath`; creates the directory first */
const makeFileLogger = (filePath: string, level: LogLevel.LogLevel) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    yield* fs.makeDirectory(Path.dirname(filePath), { recursive: true }).pipe(
      Effect.catchAll((error) => Console.error(`Could not create log directory: ${error.message}`))
    )
    const fileLogger = yield* Logger.jsonLogger.pipe(
      PlatformLogger.toFile(filePath, { batchWindow: "100 millis" })
    )
    return Logger.map(atLeast(fileLogger, level), () => undefined)
  })

/**
 * Create a logging layer based on configuration.
 *
 * Console and file each have their own level; LogLevel.None disables a target.
 * If the log file cannot be opened, logging falls back to the console only.
 */
export const createLoggingLayer = (config: LoggingConfig): Layer.Layer<never> => {
  const stdout = consoleLogger(config.stdoutLevel)
  const fileDisabled = Option.isNone(config.fileLogPath) || config.fileLogLevel === LogLevel.None

  if (fileDisabled) {
    return Logger.replace(Logger.defaultLogger, stdout)
  }

  const filePath = Option.getOrElse(config.fileLogPath, () => "server.log")
  const resolvedPath = Path.isAbsolute(filePath) ? filePath : Path.join(config.baseDir, filePath)

  const combined = Effect.map(
    makeFileLogger(resolvedPath, config.fileLogLevel),
    (fileLogger) => Logger.zipRight(stdout, fileLogger)
  )

  return Logger.replaceScoped(Logger.defaultLogger, combined).pipe(
    Layer.provide(NodeContext.layer),
    Layer.catchAll((error) =>
      Layer.effectDiscard(Console.error(`File logging failed, using console only: ${error.message}`)).pipe(
        Layer.merge(Logger.replace(Logger.defaultLogger, stdout))
      )
    )
  )
}
