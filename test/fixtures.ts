/**
 * Test Fixtures
 *
 * In-process stand-ins for everything the engine talks to:
 * - EventLog.InMemory instead of JSONL files
 * - Fake model / screenshot / workspace collaborators
 * - Gates that let a test decide when a collaborator call may finish
 */
import { Duration, Effect, Layer, Option, Queue, Ref, Stream } from "effect"
import { EngineSettings, type EngineSettingsShape } from "../src/config.ts"
import {
  EventBuilder,
  type FatalError,
  lastText,
  type RunEvent,
  type RunEventType,
  RunId,
  type RunProjection,
  type TransientCollaboratorError
} from "../src/domain.ts"
import { EventBus } from "../src/event-bus.ts"
import { EventLog } from "../src/event-log.ts"
import { EventReducer } from "../src/event-reducer.ts"
import { IterationHandlers } from "../src/handlers.ts"
import { ModelClient, type ModelRequest } from "../src/model-client.ts"
import { RunManager } from "../src/run-manager.ts"
import type { RunLoop } from "../src/run-loop.ts"
import { type CaptureRequest, ScreenshotCapturer } from "../src/screenshot.ts"
import { patchPage, Workspace, type WorkspaceEntry } from "../src/workspace.ts"

export const testRunId = RunId.make("2026-10-19T08-30-00-125Z_test")

export const testSettings: EngineSettingsShape = {
  maxIterations: Option.none(),
  iterationDelay: Duration.zero,
  initialPrompt: "build a landing page",
  subscriberCapacity: 256,
  retryBaseDelay: Duration.millis(1),
  retryMaxAttempts: 3,
  collaboratorTimeout: Duration.seconds(5)
}

// =============================================================================
// Gates
// =============================================================================

/** A turnstile: each `pass` waits for one `open` */
export interface Gate {
  readonly open: (times?: number) => Effect.Effect<void>
  readonly pass: Effect.Effect<void>
}

export const makeGate: Effect.Effect<Gate> = Effect.map(Queue.unbounded<void>(), (queue) => ({
  open: (times = 1) => Queue.offerAll(queue, Array.from({ length: times }, () => undefined)).pipe(Effect.asVoid),
  pass: Queue.take(queue)
}))

// =============================================================================
// Fake collaborators
// =============================================================================

export const screenshotUrl = (request: CaptureRequest) =>
  `/static/runs/${request.runId}/screenshots/snap_${request.iteration}.png`

export const fakeModel = (
  respond: (request: ModelRequest) => Effect.Effect<string, TransientCollaboratorError | FatalError>
): Layer.Layer<ModelClient> => Layer.succeed(ModelClient, { send: respond })

/** Model that waits for the gate before echoing */
export const gatedModel = (gate: Gate): Layer.Layer<ModelClient> =>
  fakeModel((request) => Effect.as(gate.pass, Option.getOrElse(lastText(request.content), () => "ok")))

export const fakeScreenshots = (
  before: (request: CaptureRequest) => Effect.Effect<void, TransientCollaboratorError | FatalError> = () => Effect.void
): Layer.Layer<ScreenshotCapturer> =>
  Layer.succeed(ScreenshotCapturer, {
    capture: (request) =>
      Effect.as(before(request), { url: screenshotUrl(request), path: `snap_${request.iteration}.png` })
  })

/** Workspace kept in memory, same page rules as the file implementation */
export const InMemoryWorkspace: Layer.Layer<Workspace> = Layer.sync(Workspace, () => {
  const pages = new Map<RunId, string>()
  const page = (runId: RunId) => pages.get(runId) ?? "<!doctype html>"
  return {
    ensureIndex: (runId) =>
      Effect.sync(() => {
        pages.set(runId, page(runId))
        return `${runId}/workspace/index.html`
      }),
    applyIteration: (runId, iteration, response) =>
      Effect.sync(() => {
        pages.set(runId, patchPage(page(runId), iteration, response))
        return `${runId}/workspace/index.html`
      }),
    tree: (runId) =>
      Effect.sync((): ReadonlyArray<WorkspaceEntry> =>
        pages.has(runId) ? [{ path: "index.html", is_dir: false, size: page(runId).length, mtime: 0 }] : []
      )
  }
})

// =============================================================================
// Layers
// =============================================================================

export interface EngineLayerOptions {
  readonly model?: Layer.Layer<ModelClient>
  readonly screenshots?: Layer.Layer<ScreenshotCapturer>
  readonly settings?: Partial<EngineSettingsShape>
}

/** Everything a run loop needs, in memory */
export const makeLoopLayer = (options: EngineLayerOptions = {}) =>
  IterationHandlers.layer.pipe(
    Layer.provideMerge(
      Layer.mergeAll(options.model ?? ModelClient.echo, options.screenshots ?? fakeScreenshots(), InMemoryWorkspace)
    ),
    Layer.provideMerge(EventBus.fromSettings),
    Layer.provideMerge(EventLog.InMemory),
    Layer.provideMerge(EventReducer.Default),
    Layer.provideMerge(EngineSettings.layer({ ...testSettings, ...options.settings }))
  )

/** Loop layer plus the RunManager */
export const makeEngineLayer = (options: EngineLayerOptions = {}) =>
  RunManager.Default.pipe(Layer.provideMerge(makeLoopLayer(options)))

// =============================================================================
// Helpers
// =============================================================================

/** Wait until the loop's projection satisfies the predicate */
export const waitFor = (loop: RunLoop, predicate: (projection: RunProjection) => boolean) =>
  loop.changes.pipe(
    Stream.filter(predicate),
    Stream.runHead,
    Effect.flatMap(Option.match({
      onNone: () => loop.projection,
      onSome: (projection) => Effect.succeed(projection)
    }))
  )

export const types = (events: ReadonlyArray<RunEvent>): ReadonlyArray<RunEventType> => events.map((event) => event.t)

export const seqs = (events: ReadonlyArray<RunEvent>): ReadonlyArray<number> => events.map((event) => event.seq)

/** Wait for the manager's current run to end */
export const awaitCurrentRun = Effect.flatMap(
  RunManager.active,
  Option.match({
    onNone: () => Effect.dieMessage("no active run"),
    onSome: (loop) => loop.awaitStopped
  })
)

/** Events of one iteration, in order */
export const iterationEvents = (events: ReadonlyArray<RunEvent>, iteration: number) =>
  events.filter((event) => "iteration" in event && event.iteration === iteration)

/** A short valid history: started, one full iteration */
export const sampleHistory = (runId: RunId = testRunId): ReadonlyArray<RunEvent> => [
  EventBuilder.runStarted(EventBuilder.base(runId, 0)),
  EventBuilder.promptSent(
    EventBuilder.base(runId, 1),
    { actor: "user", to: "code", content: [{ type: "text", text: "hello" }] },
    1
  ),
  EventBuilder.responseReceived(EventBuilder.base(runId, 2), { actor: "code", text: "hello" }, 1),
  EventBuilder.screenshotCaptured(EventBuilder.base(runId, 3), `/static/runs/${runId}/screenshots/snap_1.png`, 1)
]

/** Counter for "fail N times then succeed" collaborators */
export const failingTimes = (times: number) =>
  Effect.map(Ref.make(0), (calls) => ({
    calls: Ref.get(calls),
    attempt: <E>(fail: () => E): Effect.Effect<void, E> =>
      Effect.flatMap(Ref.getAndUpdate(calls, (n) => n + 1), (n) => n < times ? Effect.fail(fail()) : Effect.void)
  }))
