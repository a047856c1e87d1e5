/**
 * Screenshot collaborator.
 *
 * Captures the run's page after each iteration and returns a url clients can fetch.
 * Artifacts land in {runDir}/screenshots/snap_{iteration}.{ext}.
 */

import { Command, FileSystem, Path } from "@effect/platform"
import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import { Context, Effect, Layer, Option } from "effect"
import { FatalError, type RunId, TransientCollaboratorError } from "./domain.ts"
import { StoragePaths } from "./paths.ts"

export interface CaptureRequest {
  readonly runId: RunId
  readonly iteration: number
  /** Page to capture */
  readonly htmlPath: string
}

export interface Screenshot {
  readonly url: string
  readonly path: string
}

export type ScreenshotError = TransientCollaboratorError | FatalError

/** Split a command template into argv, substituting {url} and {out} */
export const renderCommand = (
  template: string,
  values: { readonly url: string; readonly out: string }
): ReadonlyArray<string> =>
  template
    .trim()
    .split(/\s+/)
    .filter((arg) => arg !== "")
    .map((arg) => arg.replaceAll("{url}", values.url).replaceAll("{out}", values.out))

export class ScreenshotCapturer extends Context.Tag("@iteration-engine/ScreenshotCapturer")<
  ScreenshotCapturer,
  {
    readonly capture: (request: CaptureRequest) => Effect.Effect<Screenshot, ScreenshotError>
  }
>() {
  /** Keeps a copy of the page as it was after the iteration */
  static readonly htmlSnapshot: Layer.Layer<ScreenshotCapturer, never, FileSystem.FileSystem | StoragePaths> = Layer
    .effect(
      ScreenshotCapturer,
      Effect.gen(function*() {
        const fs = yield* FileSystem.FileSystem
        const paths = yield* StoragePaths

        return {
          capture: (request) =>
            Effect.gen(function*() {
              const out = paths.screenshotFile(request.runId, request.iteration, "html")
              yield* fs.makeDirectory(paths.screenshotsDir(request.runId), { recursive: true })
              yield* fs.copyFile(request.htmlPath, out)
              return { url: paths.screenshotUrl(request.runId, `snap_${request.iteration}.html`), path: out }
            }).pipe(
              Effect.mapError((error) =>
                new TransientCollaboratorError({
                  collaborator: "screenshot",
                  message: `Snapshot failed: ${error.message}`,
                  cause: Option.some(error)
                })
              )
            )
        }
      })
    )

  /**
   * Runs an external renderer, e.g. `chromium --headless --screenshot={out} {url}`.
   * The command must exit 0 and leave a PNG at {out}.
   */
  static command(
    template: string
  ): Layer.Layer<ScreenshotCapturer, never, FileSystem.FileSystem | Path.Path | StoragePaths | CommandExecutor> {
    return Layer.effect(
      ScreenshotCapturer,
      Effect.gen(function*() {
        const fs = yield* FileSystem.FileSystem
        const path = yield* Path.Path
        const paths = yield* StoragePaths
        const executor = yield* Effect.context<CommandExecutor>()

        const capture = (request: CaptureRequest): Effect.Effect<Screenshot, ScreenshotError> =>
          Effect.gen(function*() {
            const out = paths.screenshotFile(request.runId, request.iteration, "png")
            const url = yield* path.toFileUrl(path.resolve(request.htmlPath)).pipe(
              Effect.mapError((error) =>
                new FatalError({ where: "screenshot", message: error.message, cause: Option.some(error) })
              )
            )
            const [program, ...args] = renderCommand(template, { url: url.href, out })
            if (program === undefined) {
              return yield* new FatalError({
                where: "screenshot",
                message: "Screenshot command is empty",
                cause: Option.none()
              })
            }

            yield* fs.makeDirectory(paths.screenshotsDir(request.runId), { recursive: true }).pipe(
              Effect.mapError((error) =>
                new FatalError({ where: "screenshot", message: error.message, cause: Option.some(error) })
              )
            )

            const exitCode = yield* Command.make(program, ...args).pipe(
              Command.exitCode,
              Effect.mapError((error) =>
                new FatalError({
                  where: "screenshot",
                  message: `Failed to run ${program}: ${error.message}`,
                  cause: Option.some(error)
                })
              )
            )
            if (exitCode !== 0) {
              return yield* new TransientCollaboratorError({
                collaborator: "screenshot",
                message: `${program} exited with code ${exitCode}`,
                cause: Option.none()
              })
            }

            const produced = yield* fs.exists(out).pipe(Effect.orElseSucceed(() => false))
            if (!produced) {
              return yield* new TransientCollaboratorError({
                collaborator: "screenshot",
                message: `${program} did not write ${out}`,
                cause: Option.none()
              })
            }

            return { url: paths.screenshotUrl(request.runId, `snap_${request.iteration}.png`), path: out }
          }).pipe(Effect.provide(executor))

        return { capture }
      })
    )
  }
}
