/**
 * Main Entry Point
 *
 * Loads configuration, sets up logging and service layers, then serves the HTTP API.
 */
import { FetchHttpClient, HttpServer } from "@effect/platform"
import { NodeContext, NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Cause, Effect, Layer, Option } from "effect"
import { createServer } from "node:http"
import {
  AppConfig,
  EngineSettings,
  extractConfigPath,
  IterationEngineConfig,
  makeConfigProvider
} from "./config.ts"
import { EventBus } from "./event-bus.ts"
import { EventLogFileSystem } from "./event-log-fs.ts"
import { EventReducer } from "./event-reducer.ts"
import { IterationHandlers } from "./handlers.ts"
import { makeRouter } from "./http.ts"
import { createLoggingLayer, loggingConfigFrom } from "./logging.ts"
import { ModelClient } from "./model-client.ts"
import { StoragePaths } from "./paths.ts"
import { RunManager } from "./run-manager.ts"
import { ScreenshotCapturer } from "./screenshot.ts"
import { Workspace } from "./workspace.ts"

// =============================================================================
// Layer Factories
// =============================================================================

/**
 * Model client: the OpenAI-compatible endpoint when a key is configured,
 * otherwise the offline echo model.
 */
const makeModelLayer = (config: IterationEngineConfig) =>
  Option.match(config.modelApiKey, {
    onNone: () => ModelClient.echo,
    onSome: (apiKey) =>
      ModelClient.openAiCompatible({
        apiKey,
        baseUrl: config.modelBaseUrl,
        codeModel: config.codeModel,
        visionModel: config.visionModel,
        appName: config.appName
      }).pipe(Layer.provide(FetchHttpClient.layer))
  })

/**
 * Screenshots: an external command when configured, otherwise HTML snapshots.
 */
const makeScreenshotLayer = (config: IterationEngineConfig) =>
  Option.match(config.screenshotCommand, {
    onNone: () => ScreenshotCapturer.htmlSnapshot,
    onSome: (template) => ScreenshotCapturer.command(template)
  })

/**
 * Engine services, from the run manager down to the platform.
 */
export const makeEngineLayer = (config: IterationEngineConfig) =>
  RunManager.Default.pipe(
    Layer.provideMerge(IterationHandlers.layer),
    Layer.provideMerge(Layer.mergeAll(makeModelLayer(config), makeScreenshotLayer(config), Workspace.layer)),
    Layer.provideMerge(EventBus.fromSettings),
    Layer.provideMerge(EventLogFileSystem),
    Layer.provideMerge(EventReducer.Default),
    Layer.provideMerge(EngineSettings.fromAppConfig),
    Layer.provideMerge(StoragePaths.layer),
    Layer.provideMerge(AppConfig.fromConfig(config)),
    Layer.provideMerge(NodeContext.layer)
  )

/** Start the first run as soon as the server is up, unless disabled */
const autoStartLayer = (config: IterationEngineConfig) =>
  Layer.effectDiscard(
    Effect.gen(function*() {
      if (!config.autoStart) {
        yield* Effect.logInfo("Auto-start disabled; POST /api/runs to begin")
        return
      }
      const runId = yield* RunManager.start
      yield* Effect.logInfo("Run auto-started").pipe(Effect.annotateLogs({ runId }))
    }).pipe(
      Effect.catchAll((error) => Effect.logError("Auto-start failed", { error: error.message }))
    )
  )

// =============================================================================
// Run
// =============================================================================

const program = Effect.gen(function*() {
  // Phase 1: Load config (no logging yet)
  const args = process.argv.slice(2)
  const configProvider = yield* makeConfigProvider(extractConfigPath(args), args)
  const config = yield* IterationEngineConfig.pipe(Effect.withConfigProvider(configProvider))
  const loggingLayer = createLoggingLayer(loggingConfigFrom(config))

  // Phase 2: Serve with logging in place
  const serverLayer = HttpServer.serve(makeRouter).pipe(
    HttpServer.withLogAddress,
    Layer.provide(NodeHttpServer.layer(createServer, { port: config.port, host: config.host }))
  )

  const appLayer = Layer.mergeAll(serverLayer, autoStartLayer(config)).pipe(
    Layer.provide(makeEngineLayer(config))
  )

  return yield* Effect.logDebug("Using config", { port: config.port, dataDir: config.dataStorageDir }).pipe(
    Effect.zipRight(Layer.launch(appLayer)),
    Effect.provide(loggingLayer),
    Effect.withConfigProvider(configProvider)
  )
})

program.pipe(
  Effect.provide(NodeContext.layer),
  Effect.catchAllCause((cause) =>
    Cause.isInterruptedOnly(cause) ? Effect.void : Effect.logError(`Fatal error: ${Cause.pretty(cause)}`)
  ),
  (effect) => NodeRuntime.runMain(effect, { disablePrettyLogger: true })
)
