/**
 * EventReducer - Pure reducer that folds run events into a RunProjection.
 *
 * The projection is never written directly. It:
 * - Tracks the lifecycle (Idle → Running ⇄ Paused → Stopped)
 * - Remembers the last response and screenshot, which drive the next default prompt
 * - Counts events so the next sequence number is always known
 */

import { Effect, Option } from "effect"
import { ReducerError, type RunEvent, RunProjection } from "./domain.ts"

const reduceOne = (
  projection: RunProjection,
  event: RunEvent
): RunProjection => {
  const nextSeq = projection.nextSeq + 1

  switch (event.t) {
    case "run.started": {
      return { ...projection, runId: Option.some(event.runId), lifecycle: "Running", nextSeq }
    }

    case "prompt.sent": {
      return { ...projection, iteration: event.iteration, nextSeq }
    }

    case "response.received": {
      return {
        ...projection,
        lastResponse: Option.some({ actor: event.actor, text: event.text }),
        nextSeq
      }
    }

    case "screenshot.captured": {
      return {
        ...projection,
        completedIterations: projection.completedIterations + 1,
        lastScreenshotUrl: Option.some(event.url),
        nextSeq
      }
    }

    case "control.paused": {
      return { ...projection, lifecycle: "Paused", nextSeq }
    }

    case "control.resumed": {
      return { ...projection, lifecycle: "Running", nextSeq }
    }

    case "error": {
      return { ...projection, lifecycle: "Stopped", lastError: Option.some(event.msg), nextSeq }
    }

    case "run.completed": {
      return { ...projection, lifecycle: "Stopped", nextSeq }
    }

    default: {
      // Exhaustiveness check - if a new event type is added, this will cause a compile error
      const _exhaustiveCheck: never = event
      return _exhaustiveCheck
    }
  }
}

const checkOrder = (projection: RunProjection, event: RunEvent): Option.Option<ReducerError> => {
  if (event.seq !== projection.nextSeq) {
    return Option.some(
      new ReducerError({
        message: `Expected seq ${projection.nextSeq} but got ${event.seq} (${event.t})`,
        seq: Option.some(event.seq)
      })
    )
  }
  if (Option.isSome(projection.runId) && projection.runId.value !== event.runId) {
    return Option.some(
      new ReducerError({
        message: `Event for run ${event.runId} applied to run ${projection.runId.value}`,
        seq: Option.some(event.seq)
      })
    )
  }
  if (projection.lifecycle === "Stopped") {
    return Option.some(
      new ReducerError({ message: `Event ${event.t} after the run stopped`, seq: Option.some(event.seq) })
    )
  }
  return Option.none()
}

/**
 * EventReducer folds events into RunProjection.
 * Events must arrive gap-free, starting at the projection's nextSeq.
 */
export class EventReducer extends Effect.Service<EventReducer>()("@iteration-engine/EventReducer", {
  effect: Effect.sync(() => {
    const initialProjection = RunProjection.initial()

    const reduce = (
      current: RunProjection,
      newEvents: ReadonlyArray<RunEvent>
    ): Effect.Effect<RunProjection, ReducerError> =>
      Effect.reduce(newEvents, current, (projection, event) =>
        Option.match(checkOrder(projection, event), {
          onNone: () => Effect.succeed(reduceOne(projection, event)),
          onSome: Effect.fail
        }))

    return { reduce, initialProjection }
  }),
  accessors: true
}) {}
