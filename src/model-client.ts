/**
 * Model collaborator.
 *
 * One exchange per iteration: the prompt content goes to the model chosen by
 * the route, the reply text comes back. Failures are classified here so the
 * handlers know what to retry.
 */
import * as HttpBody from "@effect/platform/HttpBody"
import * as HttpClient from "@effect/platform/HttpClient"
import type * as HttpClientError from "@effect/platform/HttpClientError"
import * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import type * as Redacted from "effect/Redacted"
import * as Schema from "effect/Schema"
import {
  type ContentPart,
  FatalError,
  lastText,
  type PromptContent,
  type Route,
  type RunId,
  TransientCollaboratorError
} from "./domain.ts"

export interface ModelRequest {
  readonly runId: RunId
  readonly iteration: number
  readonly route: Route
  readonly content: PromptContent
}

export type ModelError = TransientCollaboratorError | FatalError

export interface ModelClientOptions {
  readonly apiKey: Redacted.Redacted
  readonly baseUrl: string
  readonly codeModel: string
  readonly visionModel: string
  readonly appName: string
}

const SYSTEM_PROMPTS: Record<Route, string> = {
  code: "You build a single self-contained web page. Reply with the complete page in one ```html fenced block, " +
    "followed by a short note on what changed.",
  vision: "You review a screenshot of a web page. Describe concrete visual problems and the next improvement " +
    "to make, in a few sentences."
}

const ChatCompletionResponse = Schema.Struct({
  choices: Schema.NonEmptyArray(Schema.Struct({
    message: Schema.Struct({
      content: Schema.NullOr(Schema.String)
    })
  }))
})

const decodeResponse = Schema.decodeUnknown(ChatCompletionResponse)

// Statuses worth another attempt: request timeout, rate limit, server side failures.
// 402 (no credits) and other client errors are final.
export const isTransientStatus = (status: number): boolean => status === 408 || status === 429 || status >= 500

const slug = (name: string) =>
  name.trim().toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "")

const toMessagePart = (part: ContentPart) => typeof part === "string" ? { type: "text", text: part } : part

const classifyHttpError = (error: HttpClientError.HttpClientError): ModelError => {
  if (error._tag === "RequestError") {
    return new TransientCollaboratorError({
      collaborator: "model",
      message: `Model request failed: ${error.message}`,
      cause: Option.some(error)
    })
  }
  return new FatalError({
    where: "model",
    message: `Model response unreadable: ${error.message}`,
    cause: Option.some(error)
  })
}

export class ModelClient extends Context.Tag("@iteration-engine/ModelClient")<
  ModelClient,
  {
    readonly send: (request: ModelRequest) => Effect.Effect<string, ModelError>
  }
>() {
  /** Offline model: replies with the last text of the prompt, or "ok" */
  static readonly echo: Layer.Layer<ModelClient> = Layer.succeed(ModelClient, {
    send: (request) => Effect.succeed(Option.getOrElse(lastText(request.content), () => "ok"))
  })

  /** Any OpenAI-compatible /chat/completions endpoint */
  static openAiCompatible(options: ModelClientOptions): Layer.Layer<ModelClient, never, HttpClient.HttpClient> {
    return Layer.effect(
      ModelClient,
      Effect.gen(function*() {
        const httpClient = (yield* HttpClient.HttpClient).pipe(
          HttpClient.mapRequest((request) =>
            request.pipe(
              HttpClientRequest.prependUrl(options.baseUrl),
              HttpClientRequest.bearerToken(options.apiKey),
              HttpClientRequest.acceptJson,
              HttpClientRequest.setHeaders({
                "X-Title": options.appName,
                "HTTP-Referer": `https://${slug(options.appName)}.local`
              })
            )
          )
        )

        const send = (request: ModelRequest): Effect.Effect<string, ModelError> =>
          Effect.gen(function*() {
            const model = request.route === "code" ? options.codeModel : options.visionModel
            const httpRequest = HttpClientRequest.post("/chat/completions", {
              body: HttpBody.unsafeJson({
                model,
                messages: [
                  { role: "system", content: SYSTEM_PROMPTS[request.route] },
                  { role: "user", content: request.content.map(toMessagePart) }
                ]
              })
            })

            const response = yield* httpClient.execute(httpRequest).pipe(
              Effect.mapError(classifyHttpError)
            )

            if (response.status < 200 || response.status >= 300) {
              const detail = yield* response.text.pipe(Effect.orElseSucceed(() => ""))
              const message = `Model returned HTTP ${response.status}${detail === "" ? "" : `: ${detail.slice(0, 200)}`}`
              const error: ModelError = isTransientStatus(response.status)
                ? new TransientCollaboratorError({ collaborator: "model", message, cause: Option.none() })
                : new FatalError({ where: "model", message, cause: Option.none() })
              return yield* Effect.fail(error)
            }

            const json = yield* response.json.pipe(Effect.mapError(classifyHttpError))
            const body = yield* decodeResponse(json).pipe(
              Effect.mapError((error) =>
                new FatalError({ where: "model", message: "Malformed completion body", cause: Option.some(error) })
              )
            )
            return body.choices[0].message.content ?? ""
          }).pipe(
            Effect.scoped,
            Effect.annotateLogs({ runId: request.runId, iteration: request.iteration, route: request.route })
          )

        return { send }
      })
    )
  }
}
