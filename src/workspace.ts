/**
 * Workspace - The page a run is iterating on.
 *
 * {runDir}/workspace/index.html is created on first use. Each iteration:
 * - a code response with a ```html block replaces the page
 * - an `<!-- iter:N -->` marker is appended once per iteration
 */

import { FileSystem, Path } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { Context, Effect, Layer, Option } from "effect"
import { FatalError, type LastResponse, type RunId } from "./domain.ts"
import { StoragePaths } from "./paths.ts"

export const INITIAL_PAGE = "<!doctype html><title>Iteration</title><h1>Iteration</h1><div id='app'></div>"

export interface WorkspaceEntry {
  readonly path: string
  readonly is_dir: boolean
  readonly size: number
  /** Seconds since epoch */
  readonly mtime: number
}

export const iterationMarker = (iteration: number) => `\n<!-- iter:${iteration} -->\n`

const HTML_BLOCK = /```html[^\n]*\n([\s\S]*?)```/i

/** Page carried by a fenced html block, if the text has one */
export const extractHtml = (text: string): Option.Option<string> =>
  Option.fromNullable(HTML_BLOCK.exec(text)?.[1]).pipe(
    Option.map((html) => html.trim()),
    Option.filter((html) => html !== "")
  )

/** New page content after an iteration. Applying the same iteration twice changes nothing. */
export const patchPage = (current: string, iteration: number, response: LastResponse): string => {
  const base = response.actor === "code"
    ? Option.getOrElse(extractHtml(response.text), () => current)
    : current
  const marker = iterationMarker(iteration)
  return base.includes(marker) ? base : base + marker
}

export interface WorkspaceShape {
  /** Path of the run's index page, created if missing */
  readonly ensureIndex: (runId: RunId) => Effect.Effect<string, FatalError>
  /** Apply an iteration's response to the page; returns the page path */
  readonly applyIteration: (
    runId: RunId,
    iteration: number,
    response: LastResponse
  ) => Effect.Effect<string, FatalError>
  /** Shallow listing of the workspace directory, dotfiles skipped, sorted by name */
  readonly tree: (runId: RunId) => Effect.Effect<ReadonlyArray<WorkspaceEntry>, FatalError>
}

const toFatal = (message: string) => (error: PlatformError) =>
  new FatalError({ where: "workspace", message: `${message}: ${error.message}`, cause: Option.some(error) })

export class Workspace extends Context.Tag("@iteration-engine/Workspace")<Workspace, WorkspaceShape>() {
  static readonly layer: Layer.Layer<Workspace, never, FileSystem.FileSystem | Path.Path | StoragePaths> = Layer
    .effect(
      Workspace,
      Effect.gen(function*() {
        const fs = yield* FileSystem.FileSystem
        const path = yield* Path.Path
        const paths = yield* StoragePaths

        const indexPath = (runId: RunId) => path.join(paths.workspaceDir(runId), "index.html")

        const ensureIndex = (runId: RunId) =>
          Effect.gen(function*() {
            const file = indexPath(runId)
            if (!(yield* fs.exists(file))) {
              yield* fs.makeDirectory(paths.workspaceDir(runId), { recursive: true })
              yield* fs.writeFileString(file, INITIAL_PAGE)
            }
            return file
          }).pipe(Effect.mapError(toFatal("Failed to prepare workspace")))

        const applyIteration = (runId: RunId, iteration: number, response: LastResponse) =>
          Effect.gen(function*() {
            const file = yield* ensureIndex(runId)
            const current = yield* fs.readFileString(file).pipe(Effect.mapError(toFatal("Failed to read page")))
            const next = patchPage(current, iteration, response)
            if (next !== current) {
              yield* fs.writeFileString(file, next).pipe(Effect.mapError(toFatal("Failed to write page")))
            }
            return file
          })

        const tree = (runId: RunId) =>
          Effect.gen(function*() {
            const root = paths.workspaceDir(runId)
            if (!(yield* fs.exists(root))) return []
            const names = (yield* fs.readDirectory(root)).filter((name) => !name.startsWith(".")).sort()
            return yield* Effect.forEach(names, (name) =>
              Effect.map(fs.stat(path.join(root, name)), (info): WorkspaceEntry => {
                const isDir = info.type === "Directory"
                return {
                  path: name,
                  is_dir: isDir,
                  size: isDir ? 0 : Number(info.size),
                  mtime: Option.match(info.mtime, {
                    onNone: () => 0,
                    onSome: (date) => Math.floor(date.getTime() / 1000)
                  })
                }
              }))
          }).pipe(Effect.mapError(toFatal("Failed to list workspace")))

        return { ensureIndex, applyIteration, tree }
      })
    )
}
