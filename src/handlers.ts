/**
 * IterationHandlers - Performs the collaborator work of one iteration.
 *
 * model exchange → workspace update → screenshot capture.
 *
 * Transient collaborator failures are retried with exponential backoff.
 * Whatever still fails leaves here as a FatalError naming the collaborator.
 * Handlers never publish events; the run loop does.
 */

import { Context, Duration, Effect, Layer, Option, Schedule } from "effect"
import { EngineSettings } from "./config.ts"
import {
  type Actor,
  type Collaborator,
  FatalError,
  type LastResponse,
  type PromptContent,
  type Route,
  type RunId,
  TransientCollaboratorError
} from "./domain.ts"
import { ModelClient } from "./model-client.ts"
import { type Screenshot, ScreenshotCapturer } from "./screenshot.ts"
import { Workspace } from "./workspace.ts"

export interface IterationPrompt {
  readonly actor: Actor
  readonly to: Route
  readonly content: PromptContent
}

export interface IterationInput {
  readonly runId: RunId
  readonly iteration: number
  readonly prompt: IterationPrompt
}

export interface IterationOutput {
  readonly response: LastResponse
  readonly screenshot: Screenshot
}

export class IterationHandlers extends Context.Tag("@iteration-engine/IterationHandlers")<
  IterationHandlers,
  {
    readonly runIteration: (input: IterationInput) => Effect.Effect<IterationOutput, FatalError>
  }
>() {
  static readonly layer: Layer.Layer<
    IterationHandlers,
    never,
    ModelClient | ScreenshotCapturer | Workspace | EngineSettings
  > = Layer.effect(
    IterationHandlers,
    Effect.gen(function*() {
      const model = yield* ModelClient
      const screenshots = yield* ScreenshotCapturer
      const workspace = yield* Workspace
      const settings = yield* EngineSettings

      const retrySchedule = Schedule.exponential(settings.retryBaseDelay).pipe(
        Schedule.jittered,
        Schedule.intersect(Schedule.recurs(settings.retryMaxAttempts - 1))
      )

      const withRetry = <A>(
        collaborator: Collaborator,
        call: Effect.Effect<A, TransientCollaboratorError | FatalError>
      ): Effect.Effect<A, FatalError> =>
        call.pipe(
          Effect.timeoutFail({
            duration: settings.collaboratorTimeout,
            onTimeout: () =>
              new TransientCollaboratorError({
                collaborator,
                message: `No answer within ${Duration.format(settings.collaboratorTimeout)}`,
                cause: Option.none()
              })
          }),
          Effect.tapError((error) =>
            error._tag === "TransientCollaboratorError"
              ? Effect.logWarning(`${collaborator} call failed`).pipe(
                Effect.annotateLogs({ error: error.message, maxAttempts: settings.retryMaxAttempts })
              )
              : Effect.void
          ),
          Effect.retry({
            schedule: retrySchedule,
            while: (error) => error._tag === "TransientCollaboratorError"
          }),
          Effect.catchTag("TransientCollaboratorError", (error) =>
            Effect.fail(
              new FatalError({
                where: collaborator,
                message: `${collaborator} failed after ${settings.retryMaxAttempts} attempts: ${error.message}`,
                cause: Option.some(error)
              })
            ))
        )

      const runIteration = (input: IterationInput) =>
        Effect.gen(function*() {
          const text = yield* withRetry(
            "model",
            model.send({
              runId: input.runId,
              iteration: input.iteration,
              route: input.prompt.to,
              content: input.prompt.content
            })
          )
          const response: LastResponse = { actor: input.prompt.to, text }

          const htmlPath = yield* workspace.applyIteration(input.runId, input.iteration, response)

          const screenshot = yield* withRetry(
            "screenshot",
            screenshots.capture({ runId: input.runId, iteration: input.iteration, htmlPath })
          )

          yield* Effect.logDebug("Iteration handled").pipe(
            Effect.annotateLogs({ responseLength: text.length, screenshot: screenshot.url })
          )
          return { response, screenshot }
        }).pipe(
          Effect.annotateLogs({ runId: input.runId, iteration: input.iteration, route: input.prompt.to })
        )

      return { runIteration }
    })
  )
}
