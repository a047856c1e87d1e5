/**
 * HTTP Routes.
 *
 * Endpoints:
 * - GET  /api/events[?run_id=]         - Replay then live events of a run (SSE); `event: error` on overflow
 * - POST /api/control                  - {"action":"pause"|"resume"}
 * - POST /api/prompt                   - Queue a prompt for the next iteration
 * - POST /api/runs                     - Start a new run
 * - GET  /api/runs                     - Run ids in the event log
 * - GET  /api/runs/:runId/events       - Logged events of a run (JSON)
 * - GET  /api/runs/:runId/workspace    - Shallow listing of a run's workspace
 * - GET  /api/state                    - Lifecycle and projection of the current run
 * - GET  /api/health                   - Health check
 */

import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Option, ParseResult, Schema, Stream } from "effect"
import { decodeControlCommand, decodePromptCommand } from "./commands.ts"
import {
  encodeRunEvent,
  type EventLogError,
  type FatalError,
  type NoActiveRunError,
  type OverflowError,
  type ReducerError,
  type RunAlreadyActiveError,
  type RunEvent,
  RunId,
  type RunNotFoundError,
  type RunProjection,
  type RunStoppedError,
  ValidationError
} from "./domain.ts"
import { RunManager } from "./run-manager.ts"

const encoder = new TextEncoder()

/** Encode a RunEvent as an SSE data line */
const encodeSSE = (event: RunEvent): Uint8Array =>
  encoder.encode(`data: ${JSON.stringify(encodeRunEvent(event))}\n\n`)

/** Final frame for a subscriber dropped for falling behind; a normal end of run sends none */
const encodeOverflow = (error: OverflowError): Uint8Array =>
  encoder.encode(`event: error\ndata: ${JSON.stringify({ error: error._tag, message: error.message })}\n\n`)

/** SSE body for a subscription: one frame per event, then an error frame on overflow */
export const toSseStream = (
  events: Stream.Stream<RunEvent, OverflowError>
): Stream.Stream<Uint8Array> =>
  events.pipe(
    Stream.map(encodeSSE),
    Stream.catchAll((error) =>
      Stream.fromEffect(
        Effect.logWarning(error.message).pipe(
          Effect.annotateLogs({ subscriberId: error.subscriberId, runId: error.runId }),
          Effect.as(encodeOverflow(error))
        )
      )
    )
  )

const sseResponseOptions = {
  contentType: "text/event-stream",
  headers: {
    "Cache-Control": "no-cache",
    Connection: "keep-alive"
  }
} as const

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

type ApiError =
  | ValidationError
  | NoActiveRunError
  | RunAlreadyActiveError
  | RunStoppedError
  | RunNotFoundError
  | EventLogError
  | ReducerError
  | FatalError

const defaultStatus: Partial<Record<ApiError["_tag"], number>> = {
  ValidationError: 422,
  NoActiveRunError: 409,
  RunAlreadyActiveError: 409,
  RunStoppedError: 409,
  RunNotFoundError: 404
}

/** `{ok:false, error, message}` with the status for the error's tag (500 when unknown) */
const errorResponse = (overrides: Partial<Record<ApiError["_tag"], number>> = {}) => (error: ApiError) =>
  Effect.gen(function*() {
    const status = overrides[error._tag] ?? defaultStatus[error._tag] ?? 500
    if (status >= 500) {
      yield* Effect.logError("Request failed").pipe(Effect.annotateLogs({ error: error._tag, message: error.message }))
    } else {
      yield* Effect.logDebug("Request rejected").pipe(Effect.annotateLogs({ error: error._tag, status }))
    }
    return HttpServerResponse.unsafeJson({ ok: false, error: error._tag, message: error.message }, { status })
  })

const toValidationError = (error: ParseResult.ParseError) =>
  new ValidationError({ message: ParseResult.TreeFormatter.formatErrorSync(error) })

const readBody = Effect.gen(function*() {
  const request = yield* HttpServerRequest.HttpServerRequest
  return yield* request.text.pipe(
    Effect.mapError((error) => new ValidationError({ message: `Unreadable request body: ${error.message}` }))
  )
})

const decodeRunId = Schema.decodeUnknown(RunId)

const runIdParam = Effect.gen(function*() {
  const params = yield* HttpRouter.params
  return yield* decodeRunId(params.runId).pipe(Effect.mapError(toValidationError))
})

const EventsQuery = Schema.Struct({
  run_id: Schema.optional(RunId)
})

const encodeProjection = (projection: RunProjection) => ({
  run_id: Option.getOrNull(projection.runId),
  lifecycle: projection.lifecycle,
  next_seq: projection.nextSeq,
  iteration: projection.iteration,
  completed_iterations: projection.completedIterations,
  last_response: Option.getOrNull(projection.lastResponse),
  last_screenshot_url: Option.getOrNull(projection.lastScreenshotUrl),
  last_error: Option.getOrNull(projection.lastError)
})

// -----------------------------------------------------------------------------
// Handlers
// -----------------------------------------------------------------------------

/** Handler for GET /api/events - SSE, replay then live */
const eventsHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const query = yield* HttpServerRequest.schemaSearchParams(EventsQuery).pipe(Effect.mapError(toValidationError))

  const subscription = yield* manager.subscribe(Option.fromNullable(query.run_id))
  yield* Effect.logDebug("GET /api/events").pipe(
    Effect.annotateLogs({ runId: subscription.runId, subscriberId: subscription.id })
  )

  const sseStream = toSseStream(subscription.events).pipe(
    Stream.ensuring(manager.unsubscribe(subscription))
  )

  return HttpServerResponse.stream(sseStream, sseResponseOptions)
}).pipe(Effect.catchAll(errorResponse({ NoActiveRunError: 404 })))

/** Handler for POST /api/control */
const controlHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const command = yield* Effect.flatMap(readBody, decodeControlCommand)

  yield* Effect.logDebug("POST /api/control").pipe(Effect.annotateLogs({ action: command.action }))
  yield* manager.control(command)
  return HttpServerResponse.unsafeJson({ ok: true })
}).pipe(Effect.catchAll(errorResponse()))

/** Handler for POST /api/prompt */
const promptHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const command = yield* Effect.flatMap(readBody, decodePromptCommand)

  yield* Effect.logDebug("POST /api/prompt").pipe(
    Effect.annotateLogs({ actor: command.actor, routeTo: command.routeTo })
  )
  yield* manager.prompt(command)
  return HttpServerResponse.unsafeJson({ ok: true })
}).pipe(Effect.catchAll(errorResponse()))

/** Handler for POST /api/runs */
const startRunHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const runId = yield* manager.start
  yield* Effect.logInfo("POST /api/runs").pipe(Effect.annotateLogs({ runId }))
  return HttpServerResponse.unsafeJson({ ok: true, run_id: runId })
}).pipe(Effect.catchAll(errorResponse()))

/** Handler for GET /api/runs */
const listRunsHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const runs = yield* manager.runs
  return HttpServerResponse.unsafeJson({ runs })
})

/** Handler for GET /api/runs/:runId/events - Logged events as JSON */
const runEventsHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const runId = yield* runIdParam
  const events = yield* manager.history(runId)
  return HttpServerResponse.unsafeJson(events.map((event) => encodeRunEvent(event)))
}).pipe(Effect.catchAll(errorResponse()))

/** Handler for GET /api/runs/:runId/workspace */
const workspaceHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const runId = yield* runIdParam
  const tree = yield* manager.workspaceTree(runId)
  return HttpServerResponse.unsafeJson({ run_id: runId, tree })
}).pipe(Effect.catchAll(errorResponse()))

/** Handler for GET /api/state */
const stateHandler = Effect.gen(function*() {
  const manager = yield* RunManager
  const status = yield* manager.status
  const projection = yield* manager.currentProjection
  return HttpServerResponse.unsafeJson({
    lifecycle: status.lifecycle,
    run_id: Option.getOrNull(status.runId),
    projection: encodeProjection(projection)
  })
})

/** Health check endpoint */
const healthHandler = Effect.gen(function*() {
  yield* Effect.logDebug("GET /api/health")
  return HttpServerResponse.unsafeJson({ status: "ok" })
})

/** Create the HTTP router - context requirements will be inferred */
export const makeRouter = HttpRouter.empty.pipe(
  HttpRouter.get("/api/events", eventsHandler),
  HttpRouter.post("/api/control", controlHandler),
  HttpRouter.post("/api/prompt", promptHandler),
  HttpRouter.post("/api/runs", startRunHandler),
  HttpRouter.get("/api/runs", listRunsHandler),
  HttpRouter.get("/api/runs/:runId/events", runEventsHandler),
  HttpRouter.get("/api/runs/:runId/workspace", workspaceHandler),
  HttpRouter.get("/api/state", stateHandler),
  HttpRouter.get("/api/health", healthHandler)
)
