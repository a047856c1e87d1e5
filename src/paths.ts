/**
 * Storage layout for runs.
 *
 * {root}/runs/{runId}/events.jsonl
 * {root}/runs/{runId}/workspace/index.html
 * {root}/runs/{runId}/screenshots/snap_{iteration}.{ext}
 *
 * Screenshot files are referenced from events as /static/runs/{runId}/screenshots/{file}.
 */

import { Path } from "@effect/platform"
import { Context, DateTime, Effect, Layer, Option, Random } from "effect"
import { AppConfig } from "./config.ts"
import { RunId } from "./domain.ts"

const RUN_ID_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789"

/**
 * New run id: UTC creation time with `:` and `.` replaced, plus a random suffix.
 * Lexicographic order follows creation order, e.g. 2026-10-19T08-30-00-125Z_k3x9.
 */
export const makeRunId: Effect.Effect<RunId> = Effect.gen(function*() {
  const now = yield* DateTime.now
  const stamp = DateTime.formatIso(now).replace(/[:.]/g, "-")
  let suffix = ""
  for (let i = 0; i < 4; i++) {
    const index = yield* Random.nextIntBetween(0, RUN_ID_ALPHABET.length)
    suffix += RUN_ID_ALPHABET.charAt(index)
  }
  return RunId.make(`${stamp}_${suffix}`)
})

export interface StoragePathsShape {
  readonly root: string
  readonly runsDir: string
  readonly runDir: (runId: RunId) => string
  readonly eventsFile: (runId: RunId) => string
  readonly workspaceDir: (runId: RunId) => string
  readonly screenshotsDir: (runId: RunId) => string
  readonly screenshotFile: (runId: RunId, iteration: number, extension: string) => string
  readonly screenshotUrl: (runId: RunId, fileName: string) => string
}

export class StoragePaths extends Context.Tag("@iteration-engine/StoragePaths")<
  StoragePaths,
  StoragePathsShape
>() {
  static make(root: string, path: Path.Path): StoragePathsShape {
    const runsDir = path.join(root, "runs")
    const runDir = (runId: RunId) => path.join(runsDir, runId)
    const screenshotsDir = (runId: RunId) => path.join(runDir(runId), "screenshots")
    return {
      root,
      runsDir,
      runDir,
      eventsFile: (runId) => path.join(runDir(runId), "events.jsonl"),
      workspaceDir: (runId) => path.join(runDir(runId), "workspace"),
      screenshotsDir,
      screenshotFile: (runId, iteration, extension) => path.join(screenshotsDir(runId), `snap_${iteration}.${extension}`),
      screenshotUrl: (runId, fileName) => `/static/runs/${runId}/screenshots/${fileName}`
    }
  }

  static fromRoot(root: string): Layer.Layer<StoragePaths, never, Path.Path> {
    return Layer.effect(StoragePaths, Effect.map(Path.Path, (path) => StoragePaths.make(root, path)))
  }

  /** Root resolved from AppConfig: {cwd}/{dataStorageDir} */
  static readonly layer: Layer.Layer<StoragePaths, never, AppConfig | Path.Path> = Layer.effect(
    StoragePaths,
    Effect.gen(function*() {
      const config = yield* AppConfig
      const path = yield* Path.Path
      const cwd = Option.getOrElse(config.cwd, () => process.cwd())
      return StoragePaths.make(path.resolve(cwd, config.dataStorageDir), path)
    })
  )
}
