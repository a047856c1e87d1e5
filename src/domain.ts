/**
 * Domain types for the iteration engine.
 *
 * - Events are immutable, sequence-numbered records of a run
 * - The event wire shape is `{ t, run_id, seq, ts, ...payload }`
 * - State is never stored directly: it is the fold of a run's events (RunProjection)
 */

import { DateTime, Option, Schema } from "effect"

// -----------------------------------------------------------------------------
// Branded Types
// -----------------------------------------------------------------------------

// Run ids name directories, so they are restricted to a path-safe alphabet
export const RunId = Schema.String.pipe(Schema.pattern(/^[0-9A-Za-z_-]+$/), Schema.brand("RunId"))
export type RunId = typeof RunId.Type

export const SubscriberId = Schema.String.pipe(Schema.brand("SubscriberId"))
export type SubscriberId = typeof SubscriberId.Type

export const SequenceNumber = Schema.Int.pipe(Schema.nonNegative())

export const IterationNumber = Schema.Int.pipe(Schema.positive())

// -----------------------------------------------------------------------------
// Actors, routes, lifecycle
// -----------------------------------------------------------------------------

/** Who originated a prompt */
export const Actor = Schema.Literal("user", "vision", "code")
export type Actor = typeof Actor.Type

/** Which handler consumes a prompt */
export const Route = Schema.Literal("vision", "code")
export type Route = typeof Route.Type

export const Lifecycle = Schema.Literal("Idle", "Running", "Paused", "Stopped")
export type Lifecycle = typeof Lifecycle.Type

/** External components invoked by the handlers */
export const Collaborator = Schema.Literal("model", "screenshot", "workspace")
export type Collaborator = typeof Collaborator.Type

// -----------------------------------------------------------------------------
// Content parts
// -----------------------------------------------------------------------------

// Parts are opaque to the engine: unknown keys survive decoding and encoding.
const preserveExcess = { parseOptions: { onExcessProperty: "preserve" } } as const

export const TextPart = Schema.Struct({
  type: Schema.Literal("text"),
  text: Schema.String
}).annotations(preserveExcess)
export type TextPart = typeof TextPart.Type

export const ImagePart = Schema.Struct({
  type: Schema.Literal("image_url"),
  image_url: Schema.Struct({ url: Schema.String }).annotations(preserveExcess)
}).annotations(preserveExcess)
export type ImagePart = typeof ImagePart.Type

export const ContentPart = Schema.Union(Schema.String, TextPart, ImagePart)
export type ContentPart = typeof ContentPart.Type

export const PromptContent = Schema.NonEmptyArray(ContentPart)
export type PromptContent = typeof PromptContent.Type

/** Text carried by a part, if any. Bare strings count as text. */
export const partText = (part: ContentPart): Option.Option<string> => {
  if (typeof part === "string") return Option.some(part)
  return part.type === "text" ? Option.some(part.text) : Option.none()
}

/** Last text part of a prompt */
export const lastText = (content: ReadonlyArray<ContentPart>): Option.Option<string> =>
  Option.firstSomeOf(content.map(partText).reverse())

// -----------------------------------------------------------------------------
// Base Event Fields
// -----------------------------------------------------------------------------

export const BaseEventFields = {
  runId: Schema.propertySignature(RunId).pipe(Schema.fromKey("run_id")),
  seq: SequenceNumber,
  ts: Schema.DateTimeUtc
}

export interface EventBase {
  readonly runId: RunId
  readonly seq: number
  readonly ts: DateTime.Utc
}

// -----------------------------------------------------------------------------
// Event Types - Run lifecycle
// -----------------------------------------------------------------------------

export class RunStartedEvent extends Schema.Class<RunStartedEvent>("RunStartedEvent")({
  t: Schema.tag("run.started"),
  ...BaseEventFields
}) {}

export class RunCompletedEvent extends Schema.Class<RunCompletedEvent>("RunCompletedEvent")({
  t: Schema.tag("run.completed"),
  ...BaseEventFields,
  iterations: Schema.Int.pipe(Schema.nonNegative())
}) {}

export class ErrorEvent extends Schema.Class<ErrorEvent>("ErrorEvent")({
  t: Schema.tag("error"),
  ...BaseEventFields,
  msg: Schema.String,
  where: Schema.optionalWith(Schema.String, { as: "Option" })
}) {}

// -----------------------------------------------------------------------------
// Event Types - Iteration
// -----------------------------------------------------------------------------

export class PromptSentEvent extends Schema.Class<PromptSentEvent>("PromptSentEvent")({
  t: Schema.tag("prompt.sent"),
  ...BaseEventFields,
  actor: Actor,
  to: Route,
  content: PromptContent,
  iteration: IterationNumber
}) {}

export class ResponseReceivedEvent extends Schema.Class<ResponseReceivedEvent>("ResponseReceivedEvent")({
  t: Schema.tag("response.received"),
  ...BaseEventFields,
  actor: Route,
  text: Schema.String,
  iteration: IterationNumber
}) {}

export class ScreenshotCapturedEvent extends Schema.Class<ScreenshotCapturedEvent>("ScreenshotCapturedEvent")({
  t: Schema.tag("screenshot.captured"),
  ...BaseEventFields,
  url: Schema.String,
  iteration: IterationNumber
}) {}

// -----------------------------------------------------------------------------
// Event Types - Control
// -----------------------------------------------------------------------------

export class ControlPausedEvent extends Schema.Class<ControlPausedEvent>("ControlPausedEvent")({
  t: Schema.tag("control.paused"),
  ...BaseEventFields
}) {}

export class ControlResumedEvent extends Schema.Class<ControlResumedEvent>("ControlResumedEvent")({
  t: Schema.tag("control.resumed"),
  ...BaseEventFields
}) {}

// -----------------------------------------------------------------------------
// Event Union
// -----------------------------------------------------------------------------

export const RunEvent = Schema.Union(
  RunStartedEvent,
  PromptSentEvent,
  ResponseReceivedEvent,
  ScreenshotCapturedEvent,
  ControlPausedEvent,
  ControlResumedEvent,
  ErrorEvent,
  RunCompletedEvent
)
export type RunEvent = typeof RunEvent.Type
export type RunEventType = RunEvent["t"]

export const encodeRunEvent = Schema.encodeSync(RunEvent)

/** One line of the event log / one SSE message body */
export const RunEventJson = Schema.parseJson(RunEvent)

// -----------------------------------------------------------------------------
// Run Projection
// -----------------------------------------------------------------------------

export interface LastResponse {
  readonly actor: Route
  readonly text: string
}

export interface RunProjection {
  readonly runId: Option.Option<RunId>
  readonly lifecycle: Lifecycle
  readonly nextSeq: number
  /** Iteration of the most recent prompt.sent */
  readonly iteration: number
  readonly completedIterations: number
  readonly lastResponse: Option.Option<LastResponse>
  readonly lastScreenshotUrl: Option.Option<string>
  readonly lastError: Option.Option<string>
}

export const RunProjection = {
  initial: (): RunProjection => ({
    runId: Option.none(),
    lifecycle: "Idle",
    nextSeq: 0,
    iteration: 0,
    completedIterations: 0,
    lastResponse: Option.none(),
    lastScreenshotUrl: Option.none(),
    lastError: Option.none()
  })
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class ValidationError extends Schema.TaggedError<ValidationError>()(
  "ValidationError",
  { message: Schema.String }
) {}

export class TransientCollaboratorError extends Schema.TaggedError<TransientCollaboratorError>()(
  "TransientCollaboratorError",
  {
    collaborator: Collaborator,
    message: Schema.String,
    cause: Schema.optionalWith(Schema.Defect, { as: "Option" })
  }
) {}

export class FatalError extends Schema.TaggedError<FatalError>()(
  "FatalError",
  {
    where: Schema.String,
    message: Schema.String,
    cause: Schema.optionalWith(Schema.Defect, { as: "Option" })
  }
) {}

export class OverflowError extends Schema.TaggedError<OverflowError>()(
  "OverflowError",
  {
    subscriberId: SubscriberId,
    runId: RunId,
    capacity: Schema.Number
  }
) {
  override get message(): string {
    return `Subscriber ${this.subscriberId} fell ${this.capacity} events behind run ${this.runId}`
  }
}

export class EventLogError extends Schema.TaggedError<EventLogError>()(
  "EventLogError",
  {
    runId: RunId,
    message: Schema.String,
    cause: Schema.optionalWith(Schema.Defect, { as: "Option" })
  }
) {}

export class ReducerError extends Schema.TaggedError<ReducerError>()(
  "ReducerError",
  {
    message: Schema.String,
    seq: Schema.optionalWith(Schema.Number, { as: "Option" })
  }
) {}

export class NoActiveRunError extends Schema.TaggedError<NoActiveRunError>()("NoActiveRunError", {}) {
  override get message(): string {
    return "No run has been started"
  }
}

export class RunAlreadyActiveError extends Schema.TaggedError<RunAlreadyActiveError>()(
  "RunAlreadyActiveError",
  { runId: RunId }
) {
  override get message(): string {
    return `Run ${this.runId} is still active`
  }
}

export class RunStoppedError extends Schema.TaggedError<RunStoppedError>()(
  "RunStoppedError",
  { runId: RunId }
) {
  override get message(): string {
    return `Run ${this.runId} has stopped; start a new run`
  }
}

export class RunNotFoundError extends Schema.TaggedError<RunNotFoundError>()(
  "RunNotFoundError",
  { runId: RunId }
) {
  override get message(): string {
    return `Run ${this.runId} not found`
  }
}

// -----------------------------------------------------------------------------
// Event Builders
// -----------------------------------------------------------------------------

export const EventBuilder = {
  base: (runId: RunId, seq: number): EventBase => ({
    runId,
    seq,
    ts: DateTime.unsafeNow()
  }),

  runStarted: (base: EventBase) => new RunStartedEvent({ ...base }),

  promptSent: (
    base: EventBase,
    prompt: { readonly actor: Actor; readonly to: Route; readonly content: PromptContent },
    iteration: number
  ) => new PromptSentEvent({ ...base, ...prompt, iteration }),

  responseReceived: (base: EventBase, response: LastResponse, iteration: number) =>
    new ResponseReceivedEvent({ ...base, actor: response.actor, text: response.text, iteration }),

  screenshotCaptured: (base: EventBase, url: string, iteration: number) =>
    new ScreenshotCapturedEvent({ ...base, url, iteration }),

  controlPaused: (base: EventBase) => new ControlPausedEvent({ ...base }),

  controlResumed: (base: EventBase) => new ControlResumedEvent({ ...base }),

  error: (base: EventBase, msg: string, where: Option.Option<string> = Option.none()) =>
    new ErrorEvent({ ...base, msg, where }),

  runCompleted: (base: EventBase, iterations: number) => new RunCompletedEvent({ ...base, iterations })
}
