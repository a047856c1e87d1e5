/**
 * RunLoop - The state machine driving one run.
 *
 * Key patterns:
 * - One fiber runs iterations sequentially and is the only publisher of the run's events
 * - SubscriptionRef for the projection (folded from emitted events) and for the control intent
 * - Queue for injected prompts (FIFO, consumed one per iteration)
 * - Pause is cooperative: the intent is read at a single yield point between iterations
 *
 * Lifecycle: Idle → Running ⇄ Paused → Stopped
 */

import { Cause, Deferred, Duration, Effect, Option, Queue, type Scope, Stream, SubscriptionRef } from "effect"
import type { ControlCommand, PromptCommand } from "./commands.ts"
import { EngineSettings } from "./config.ts"
import {
  type EventBase,
  EventBuilder,
  type EventLogError,
  FatalError,
  type Lifecycle,
  type PromptContent,
  type ReducerError,
  type RunEvent,
  type RunId,
  type RunProjection,
  RunStoppedError
} from "./domain.ts"
import { EventBus } from "./event-bus.ts"
import { EventReducer } from "./event-reducer.ts"
import { IterationHandlers, type IterationPrompt } from "./handlers.ts"

/** What the loop should do at its next yield point */
export type RunIntent =
  | { readonly _tag: "Run" }
  | { readonly _tag: "Pause" }
  | { readonly _tag: "Stop"; readonly reason: string }

export interface RunLoop {
  readonly runId: RunId
  readonly projection: Effect.Effect<RunProjection>
  readonly lifecycle: Effect.Effect<Lifecycle>
  /** Current projection, then every change */
  readonly changes: Stream.Stream<RunProjection>
  /** Accepted immediately, applied at the next yield point */
  readonly control: (command: ControlCommand) => Effect.Effect<void, RunStoppedError>
  /** Queued; consumed by the next iteration instead of the derived prompt */
  readonly enqueuePrompt: (command: PromptCommand) => Effect.Effect<void, RunStoppedError>
  /** Stop at the next yield point, recorded as an error event */
  readonly stop: (reason: string) => Effect.Effect<void>
  /** Completes with the final projection once the loop has ended */
  readonly awaitStopped: Effect.Effect<RunProjection>
}

type LoopError = FatalError | EventLogError | ReducerError

/**
 * Prompt for the next iteration when none was injected.
 *
 * - nothing answered yet: the initial prompt goes to code
 * - code answered: its text and the latest screenshot go to vision
 * - vision answered: its text goes back to code
 */
export const derivePrompt = (projection: RunProjection, initialPrompt: string): IterationPrompt =>
  Option.match(projection.lastResponse, {
    onNone: (): IterationPrompt => ({
      actor: "user",
      to: "code",
      content: [{ type: "text", text: initialPrompt }]
    }),
    onSome: (response): IterationPrompt => {
      if (response.actor === "vision") {
        return { actor: "vision", to: "code", content: [{ type: "text", text: response.text }] }
      }
      const content: PromptContent = Option.match(projection.lastScreenshotUrl, {
        onNone: (): PromptContent => [{ type: "text", text: response.text }],
        onSome: (url): PromptContent => [
          { type: "text", text: response.text },
          { type: "image_url", image_url: { url } }
        ]
      })
      return { actor: "code", to: "vision", content }
    }
  })

const fromCommand = (command: PromptCommand): IterationPrompt => ({
  actor: command.actor,
  to: command.routeTo,
  content: command.content
})

const describeFailure = (error: LoopError): { readonly msg: string; readonly where: string } => {
  switch (error._tag) {
    case "FatalError":
      return { msg: error.message, where: error.where }
    case "EventLogError":
      return { msg: error.message, where: "event-log" }
    case "ReducerError":
      return { msg: error.message, where: "reducer" }
  }
}

// A defect in a collaborator or in the loop itself still ends the run with one error event
const failureOf = (cause: Cause.Cause<LoopError>): LoopError =>
  Option.getOrElse(Cause.failureOption(cause), () =>
    new FatalError({ where: "run-loop", message: Cause.pretty(cause), cause: Option.some(Cause.squash(cause)) }))

/**
 * Start a run: emits run.started, then iterates on a fiber tied to the scope.
 * Closing the scope interrupts the loop.
 */
export const makeRunLoop = (
  runId: RunId
): Effect.Effect<
  RunLoop,
  EventLogError | ReducerError,
  EventBus | IterationHandlers | EventReducer | EngineSettings | Scope.Scope
> =>
  Effect.gen(function*() {
    const bus = yield* EventBus
    const handlers = yield* IterationHandlers
    const reducer = yield* EventReducer
    const settings = yield* EngineSettings

    const state = yield* SubscriptionRef.make(reducer.initialProjection)
    const intent = yield* SubscriptionRef.make<RunIntent>({ _tag: "Run" })
    const prompts = yield* Queue.unbounded<PromptCommand>()
    const stopped = yield* Deferred.make<RunProjection>()

    // Only the loop fiber (and run.started below, before it forks) calls this
    const emit = (build: (base: EventBase) => RunEvent) =>
      Effect.gen(function*() {
        const current = yield* SubscriptionRef.get(state)
        const event = build(EventBuilder.base(runId, current.nextSeq))
        yield* bus.publish(event)
        const next = yield* reducer.reduce(current, [event])
        yield* SubscriptionRef.set(state, next)
        yield* Effect.logDebug(`Emitted ${event.t}`).pipe(Effect.annotateLogs({ seq: event.seq }))
      })

    const budgetExhausted = (projection: RunProjection) =>
      Option.match(settings.maxIterations, {
        onNone: () => false,
        onSome: (max) => projection.completedIterations >= max
      })

    const yieldPoint = Effect.gen(function*() {
      while (true) {
        const current = yield* SubscriptionRef.get(intent)
        const projection = yield* SubscriptionRef.get(state)
        switch (current._tag) {
          case "Stop": {
            return yield* new FatalError({ where: "control", message: current.reason, cause: Option.none() })
          }
          case "Pause": {
            if (projection.lifecycle === "Running") {
              yield* emit(EventBuilder.controlPaused)
              yield* Effect.logInfo("Run paused")
            }
            yield* intent.changes.pipe(
              Stream.filter((next) => next._tag !== "Pause"),
              Stream.take(1),
              Stream.runDrain
            )
            break
          }
          case "Run": {
            if (projection.lifecycle === "Paused") {
              yield* emit(EventBuilder.controlResumed)
              yield* Effect.logInfo("Run resumed")
            }
            return
          }
        }
      }
    })

    const runIteration = Effect.gen(function*() {
      const before = yield* SubscriptionRef.get(state)
      const iteration = before.iteration + 1
      const queued = yield* Queue.poll(prompts)
      const prompt = Option.match(queued, {
        onNone: () => derivePrompt(before, settings.initialPrompt),
        onSome: fromCommand
      })

      yield* emit((base) => EventBuilder.promptSent(base, prompt, iteration))
      const output = yield* handlers.runIteration({ runId, iteration, prompt })
      yield* emit((base) => EventBuilder.responseReceived(base, output.response, iteration))
      yield* emit((base) => EventBuilder.screenshotCaptured(base, output.screenshot.url, iteration))
    })

    const loop = Effect.gen(function*() {
      while (true) {
        const projection = yield* SubscriptionRef.get(state)
        if (budgetExhausted(projection)) {
          yield* emit((base) => EventBuilder.runCompleted(base, projection.completedIterations))
          yield* Effect.logInfo("Iteration budget exhausted").pipe(
            Effect.annotateLogs({ iterations: projection.completedIterations })
          )
          return
        }

        yield* yieldPoint
        yield* runIteration

        const after = yield* SubscriptionRef.get(state)
        if (!budgetExhausted(after) && Duration.greaterThan(settings.iterationDelay, Duration.zero)) {
          yield* Effect.sleep(settings.iterationDelay)
        }
      }
    })

    const terminate = (error: LoopError) =>
      Effect.gen(function*() {
        const { msg, where } = describeFailure(error)
        yield* Effect.logError("Run stopped on error").pipe(Effect.annotateLogs({ error: msg, where }))
        yield* emit((base) => EventBuilder.error(base, msg, Option.some(where))).pipe(
          Effect.catchAll((cause) =>
            Effect.logError("Error event could not be recorded", { cause }).pipe(
              Effect.zipRight(SubscriptionRef.update(state, (projection) => ({
                ...projection,
                lifecycle: "Stopped" as const,
                lastError: Option.some(msg)
              })))
            )
          )
        )
      })

    const finish = Effect.gen(function*() {
      yield* bus.complete(runId)
      const final = yield* SubscriptionRef.get(state)
      yield* Deferred.succeed(stopped, final)
    })

    const ensureAccepting = Effect.gen(function*() {
      const done = yield* Deferred.isDone(stopped)
      const projection = yield* SubscriptionRef.get(state)
      const current = yield* SubscriptionRef.get(intent)
      if (done || projection.lifecycle === "Stopped" || current._tag === "Stop") {
        return yield* new RunStoppedError({ runId })
      }
    })

    yield* emit(EventBuilder.runStarted)
    yield* Effect.logInfo("Run started")

    yield* loop.pipe(
      Effect.catchAllCause((cause) =>
        Cause.isInterruptedOnly(cause) ? Effect.failCause(cause) : terminate(failureOf(cause))
      ),
      Effect.ensuring(finish),
      Effect.annotateLogs({ runId }),
      Effect.forkScoped
    )

    const control = (command: ControlCommand) =>
      Effect.gen(function*() {
        yield* ensureAccepting
        yield* SubscriptionRef.update(intent, (current): RunIntent => {
          if (current._tag === "Stop") return current
          return command.action === "pause" ? { _tag: "Pause" } : { _tag: "Run" }
        })
        yield* Effect.logDebug("Control accepted").pipe(Effect.annotateLogs({ runId, action: command.action }))
      })

    const enqueuePrompt = (command: PromptCommand) =>
      Effect.gen(function*() {
        yield* ensureAccepting
        yield* Queue.offer(prompts, command)
        yield* Effect.logDebug("Prompt queued").pipe(Effect.annotateLogs({ runId, routeTo: command.routeTo }))
      })

    const stop = (reason: string) =>
      SubscriptionRef.update(intent, (current): RunIntent => current._tag === "Stop" ? current : { _tag: "Stop", reason })

    return {
      runId,
      projection: SubscriptionRef.get(state),
      lifecycle: Effect.map(SubscriptionRef.get(state), (projection) => projection.lifecycle),
      changes: state.changes,
      control,
      enqueuePrompt,
      stop,
      awaitStopped: Deferred.await(stopped)
    } satisfies RunLoop
  }).pipe(Effect.annotateLogs({ runId }))
