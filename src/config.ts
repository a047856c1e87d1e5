/**
 * Configuration Module
 *
 * Precedence: CLI arguments → environment variables → YAML config file → defaults
 */
import { FileSystem } from "@effect/platform"
import { Config, ConfigProvider, Context, Duration, Effect, Layer, LogLevel, Option } from "effect"
import * as yaml from "yaml"

export const DEFAULT_CONFIG_FILE = "iteration-engine.config.yaml"

/** Create a ConfigProvider from a YAML config file. Returns empty if file doesn't exist. */
export const fromYamlFile = (path: string) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const exists = yield* fs.exists(path)
    if (!exists) return ConfigProvider.fromMap(new Map())
    const content = yield* fs.readFileString(path)
    const parsed: unknown = yaml.parse(content)
    return typeof parsed === "object" && parsed !== null
      ? ConfigProvider.fromJson(parsed)
      : ConfigProvider.fromMap(new Map())
  })

const flagKey = (flag: string) => flag.toUpperCase().replace(/-/g, "_")

/**
 * CLI flags as a ConfigProvider: `--max-iterations 3` and `--max-iterations=3` both
 * set MAX_ITERATIONS. A flag followed by another flag (or nothing) reads as "true".
 */
export const fromCliArgs = (args: ReadonlyArray<string>): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(
    new Map(args.flatMap((arg, index): Array<[string, string]> => {
      if (!arg.startsWith("--")) return []
      const flag = arg.slice(2)
      const eq = flag.indexOf("=")
      if (eq >= 0) return [[flagKey(flag.slice(0, eq)), flag.slice(eq + 1)]]
      const next = args[index + 1]
      return [[flagKey(flag), next === undefined || next.startsWith("--") ? "true" : next]]
    }))
  )

/** CLI, then environment, then the YAML file; every key has its default in IterationEngineConfig */
export const makeConfigProvider = (configPath: string, args: ReadonlyArray<string>) =>
  Effect.map(fromYamlFile(configPath), (yamlProvider) =>
    fromCliArgs(args).pipe(
      ConfigProvider.orElse(() => ConfigProvider.fromEnv()),
      ConfigProvider.orElse(() => yamlProvider)
    ))

// Level names as written in config: the LogLevel labels plus a few aliases. Unknown names mean info.
const LEVEL_ALIASES: Readonly<Record<string, string>> = { WARNING: "WARN", NONE: "OFF" }

const logLevelConfig = (name: string) =>
  Config.string(name).pipe(
    Config.map((value): LogLevel.LogLevel => {
      const label = value.trim().toUpperCase()
      const wanted = LEVEL_ALIASES[label] ?? label
      return LogLevel.allLevels.find((level) => level.label === wanted) ?? LogLevel.Info
    })
  )

const millisConfig = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be >= 0`, validation: (n) => n >= 0 }),
    Config.withDefault(fallback),
    Config.map(Duration.millis)
  )

export const IterationEngineConfig = Config.all({
  dataStorageDir: Config.string("DATA_STORAGE_DIR").pipe(
    Config.withDefault("storage")
  ),

  cwd: Config.string("CWD").pipe(Config.option),

  stdoutLogLevel: logLevelConfig("STDOUT_LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info)
  ),
  fileLogLevel: logLevelConfig("FILE_LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Debug)
  ),
  logFile: Config.string("LOG_FILE").pipe(Config.withDefault("logs/server.log")),

  // HTTP server
  port: Config.integer("PORT").pipe(Config.withDefault(3000)),
  host: Config.string("HOST").pipe(Config.withDefault("0.0.0.0")),

  // Run loop
  autoStart: Config.boolean("AUTO_START").pipe(Config.withDefault(true)),
  maxIterations: Config.integer("MAX_ITERATIONS").pipe(
    Config.validate({ message: "MAX_ITERATIONS must be >= 0", validation: (n) => n >= 0 }),
    Config.option
  ),
  iterationDelay: millisConfig("ITERATION_DELAY_MS", 2000),
  initialPrompt: Config.string("INITIAL_PROMPT").pipe(Config.withDefault("iterate")),
  subscriberCapacity: Config.integer("SUBSCRIBER_CAPACITY").pipe(
    Config.validate({ message: "SUBSCRIBER_CAPACITY must be > 0", validation: (n) => n > 0 }),
    Config.withDefault(256)
  ),

  // Collaborator calls
  retryBaseDelay: millisConfig("RETRY_BASE_DELAY_MS", 500),
  retryMaxAttempts: Config.integer("RETRY_MAX_ATTEMPTS").pipe(
    Config.validate({ message: "RETRY_MAX_ATTEMPTS must be >= 1", validation: (n) => n >= 1 }),
    Config.withDefault(5)
  ),
  collaboratorTimeout: millisConfig("COLLABORATOR_TIMEOUT_MS", 120_000),

  // Model collaborator (OpenAI-compatible). Without a key the echo model is used.
  modelApiKey: Config.redacted("MODEL_API_KEY").pipe(Config.option),
  modelBaseUrl: Config.string("MODEL_BASE_URL").pipe(Config.withDefault("https://openrouter.ai/api/v1")),
  codeModel: Config.string("CODE_MODEL").pipe(Config.withDefault("openai/gpt-4o-mini")),
  visionModel: Config.string("VISION_MODEL").pipe(Config.withDefault("openai/gpt-4o-mini")),
  appName: Config.string("APP_NAME").pipe(Config.withDefault("iteration-engine")),

  // Screenshot collaborator. Without a command the rendered page is snapshotted as HTML.
  screenshotCommand: Config.string("SCREENSHOT_COMMAND").pipe(Config.option)
})

export type IterationEngineConfig = Config.Config.Success<typeof IterationEngineConfig>

export class AppConfig extends Context.Tag("@iteration-engine/AppConfig")<
  AppConfig,
  IterationEngineConfig
>() {
  static fromConfig(config: IterationEngineConfig): Layer.Layer<AppConfig> {
    return Layer.succeed(AppConfig, config)
  }
}

/**
 * The subset of configuration the run loop, bus and handlers read.
 * Kept separate from AppConfig so tests can build it without the full config.
 */
export interface EngineSettingsShape {
  readonly maxIterations: Option.Option<number>
  readonly iterationDelay: Duration.Duration
  readonly initialPrompt: string
  readonly subscriberCapacity: number
  readonly retryBaseDelay: Duration.Duration
  readonly retryMaxAttempts: number
  readonly collaboratorTimeout: Duration.Duration
}

export const defaultEngineSettings: EngineSettingsShape = {
  maxIterations: Option.none(),
  iterationDelay: Duration.seconds(2),
  initialPrompt: "iterate",
  subscriberCapacity: 256,
  retryBaseDelay: Duration.millis(500),
  retryMaxAttempts: 5,
  collaboratorTimeout: Duration.minutes(2)
}

export class EngineSettings extends Context.Tag("@iteration-engine/EngineSettings")<
  EngineSettings,
  EngineSettingsShape
>() {
  static layer(overrides: Partial<EngineSettingsShape> = {}): Layer.Layer<EngineSettings> {
    return Layer.succeed(EngineSettings, { ...defaultEngineSettings, ...overrides })
  }

  static readonly fromAppConfig: Layer.Layer<EngineSettings, never, AppConfig> = Layer.effect(
    EngineSettings,
    Effect.map(AppConfig, (config) => ({
      maxIterations: config.maxIterations,
      iterationDelay: config.iterationDelay,
      initialPrompt: config.initialPrompt,
      subscriberCapacity: config.subscriberCapacity,
      retryBaseDelay: config.retryBaseDelay,
      retryMaxAttempts: config.retryMaxAttempts,
      collaboratorTimeout: config.collaboratorTimeout
    }))
  )
}

export const extractConfigPath = (args: ReadonlyArray<string>): string => {
  const configIdx = args.findIndex((a) => a === "--config" || a === "-c")
  const nextArg = configIdx >= 0 ? args[configIdx + 1] : undefined
  if (nextArg !== undefined) {
    return nextArg
  }
  return DEFAULT_CONFIG_FILE
}

export const resolveBaseDir = (config: IterationEngineConfig): string => {
  const cwd = Option.getOrElse(config.cwd, () => process.cwd())
  return `${cwd}/${config.dataStorageDir}`
}
