/**
 * RunManager - Owns the run loop of the current run.
 *
 * Key responsibilities:
 * - Start runs (at most one Running/Paused run at a time)
 * - Route control commands and prompts to the current run
 * - Serve subscriptions, history and projections for current and past runs
 * - Close the current run's scope on shutdown
 */

import { Duration, Effect, Exit, Option, Ref, Scope, Stream } from "effect"
import type { ControlCommand, PromptCommand } from "./commands.ts"
import { EngineSettings } from "./config.ts"
import {
  type EventLogError,
  type Lifecycle,
  NoActiveRunError,
  type ReducerError,
  RunAlreadyActiveError,
  type RunEvent,
  type RunId,
  RunNotFoundError,
  type RunProjection,
  type RunStoppedError,
  SubscriberId
} from "./domain.ts"
import { EventBus, type Subscription } from "./event-bus.ts"
import { EventLog } from "./event-log.ts"
import { EventReducer } from "./event-reducer.ts"
import { IterationHandlers } from "./handlers.ts"
import { makeRunId } from "./paths.ts"
import { makeRunLoop, type RunLoop } from "./run-loop.ts"
import { Workspace } from "./workspace.ts"

const SHUTDOWN_GRACE = Duration.seconds(10)

interface ActiveRun {
  readonly loop: RunLoop
  readonly scope: Scope.CloseableScope
}

export interface RunStatus {
  readonly lifecycle: Lifecycle
  readonly runId: Option.Option<RunId>
}

/**
 * RunManager holds the current run explicitly; there is no global run state.
 */
export class RunManager extends Effect.Service<RunManager>()("@iteration-engine/RunManager", {
  scoped: Effect.gen(function*() {
    const bus = yield* EventBus
    const log = yield* EventLog
    const reducer = yield* EventReducer
    const workspace = yield* Workspace
    const loopContext = yield* Effect.context<EventBus | IterationHandlers | EventReducer | EngineSettings>()

    const current = yield* Ref.make<Option.Option<ActiveRun>>(Option.none())
    const startLock = yield* Effect.makeSemaphore(1)

    const requireCurrent = Effect.flatMap(
      Ref.get(current),
      Option.match({
        onNone: () => Effect.fail(new NoActiveRunError()),
        onSome: (run) => Effect.succeed(run.loop)
      })
    )

    const closeRun = (run: ActiveRun) =>
      Effect.gen(function*() {
        yield* Scope.close(run.scope, Exit.void)
        yield* Effect.logDebug("Run scope closed").pipe(Effect.annotateLogs({ runId: run.loop.runId }))
      })

    const start: Effect.Effect<RunId, RunAlreadyActiveError | EventLogError | ReducerError> = startLock.withPermits(1)(
      Effect.gen(function*() {
        const previous = yield* Ref.get(current)
        if (Option.isSome(previous)) {
          const lifecycle = yield* previous.value.loop.lifecycle
          if (lifecycle !== "Stopped") {
            return yield* new RunAlreadyActiveError({ runId: previous.value.loop.runId })
          }
          yield* closeRun(previous.value)
          yield* Ref.set(current, Option.none())
        }

        const runId = yield* makeRunId
        const scope = yield* Scope.make()
        const loop = yield* makeRunLoop(runId).pipe(
          Effect.provide(loopContext),
          Effect.provideService(Scope.Scope, scope),
          Effect.tapError(() => Scope.close(scope, Exit.void))
        )
        yield* Ref.set(current, Option.some({ loop, scope }))
        return runId
      })
    )

    const control = (command: ControlCommand): Effect.Effect<void, NoActiveRunError | RunStoppedError> =>
      Effect.flatMap(requireCurrent, (loop) => loop.control(command))

    const prompt = (command: PromptCommand): Effect.Effect<void, NoActiveRunError | RunStoppedError> =>
      Effect.flatMap(requireCurrent, (loop) => loop.enqueuePrompt(command))

    const status: Effect.Effect<RunStatus> = Effect.flatMap(
      Ref.get(current),
      Option.match({
        onNone: () => Effect.succeed<RunStatus>({ lifecycle: "Idle", runId: Option.none() }),
        onSome: (run) =>
          Effect.map(run.loop.lifecycle, (lifecycle): RunStatus => ({ lifecycle, runId: Option.some(run.loop.runId) }))
      })
    )

    /** Projection of the current run; the initial projection when there is none */
    const currentProjection: Effect.Effect<RunProjection> = Effect.flatMap(
      Ref.get(current),
      Option.match({
        onNone: () => Effect.succeed(reducer.initialProjection),
        onSome: (run) => run.loop.projection
      })
    )

    const active: Effect.Effect<Option.Option<RunLoop>> = Effect.map(
      Ref.get(current),
      Option.map((run) => run.loop)
    )

    const requireKnown = (runId: RunId) =>
      Effect.gen(function*() {
        const isCurrent = Option.exists(yield* Ref.get(current), (run) => run.loop.runId === runId)
        if (isCurrent) return true
        if (!(yield* log.exists(runId))) {
          return yield* new RunNotFoundError({ runId })
        }
        return false
      })

    /**
     * Subscribe to a run's events (the current run by default).
     * The current run streams replay then live; any other run streams its log and ends.
     */
    const subscribe = (
      runId: Option.Option<RunId>
    ): Effect.Effect<Subscription, NoActiveRunError | RunNotFoundError | EventLogError> =>
      Effect.gen(function*() {
        const target = yield* Option.match(runId, {
          onSome: (id) => Effect.succeed(id),
          onNone: () => Effect.map(requireCurrent, (loop) => loop.runId)
        })
        const isCurrent = yield* requireKnown(target)
        if (isCurrent) {
          return yield* bus.subscribe(target)
        }
        const events = yield* bus.replay(target)
        return {
          id: SubscriberId.make(`replay-${target}`),
          runId: target,
          events: Stream.fromIterable(events)
        } satisfies Subscription
      })

    const unsubscribe = (subscription: Subscription) => bus.unsubscribe(subscription)

    const history = (runId: RunId): Effect.Effect<ReadonlyArray<RunEvent>, RunNotFoundError | EventLogError> =>
      Effect.flatMap(requireKnown(runId), () => log.read(runId))

    const projection = (
      runId: RunId
    ): Effect.Effect<RunProjection, RunNotFoundError | EventLogError | ReducerError> =>
      Effect.flatMap(history(runId), (events) => reducer.reduce(reducer.initialProjection, events))

    const runs: Effect.Effect<ReadonlyArray<RunId>> = log.list()

    const workspaceTree = (runId: RunId) =>
      Effect.flatMap(requireKnown(runId), () => workspace.tree(runId))

    // The loop records the stop at its next yield point; past the grace period it is interrupted
    const shutdown: Effect.Effect<void> = Effect.gen(function*() {
      const run = yield* Ref.getAndSet(current, Option.none())
      if (Option.isNone(run)) return
      const { loop } = run.value
      yield* Effect.logInfo("Shutting down run").pipe(Effect.annotateLogs({ runId: loop.runId }))
      yield* loop.stop("Server shutting down")
      yield* loop.awaitStopped.pipe(
        Effect.timeout(SHUTDOWN_GRACE),
        Effect.catchTag("TimeoutException", () =>
          Effect.logWarning("Run did not stop in time, interrupting").pipe(
            Effect.annotateLogs({ runId: loop.runId, grace: Duration.format(SHUTDOWN_GRACE) })
          ))
      )
      yield* closeRun(run.value)
    })

    yield* Effect.addFinalizer(() => shutdown)

    return {
      start,
      control,
      prompt,
      status,
      currentProjection,
      active,
      subscribe,
      unsubscribe,
      history,
      projection,
      runs,
      workspaceTree,
      shutdown
    }
  }),
  accessors: true
}) {}
