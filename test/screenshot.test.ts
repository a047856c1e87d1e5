/**
 * Screenshot collaborator tests
 */
import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { StoragePaths } from "../src/paths.ts"
import { renderCommand, ScreenshotCapturer } from "../src/screenshot.ts"
import { testRunId } from "./fixtures.ts"

describe("renderCommand", () => {
  it("splits the template and fills in url and output", () => {
    expect(
      renderCommand("chromium --headless --screenshot={out} {url}", {
        url: "file:///data/index.html",
        out: "/data/snap_1.png"
      })
    ).toEqual(["chromium", "--headless", "--screenshot=/data/snap_1.png", "file:///data/index.html"])
  })

  it("ignores surrounding and repeated whitespace", () => {
    expect(renderCommand("  shot   {url}  {out} ", { url: "u", out: "o" })).toEqual(["shot", "u", "o"])
  })

  it("an empty template renders nothing", () => {
    expect(renderCommand("   ", { url: "u", out: "o" })).toEqual([])
  })
})

describe("ScreenshotCapturer.htmlSnapshot", () => {
  it.effect("copies the page into the run's screenshots", () =>
    Effect.gen(function*() {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const root = yield* fs.makeTempDirectoryScoped()
      const page = path.join(root, "page.html")
      yield* fs.writeFileString(page, "<h1>v2</h1>")

      const capturer = yield* ScreenshotCapturer.pipe(
        Effect.provide(ScreenshotCapturer.htmlSnapshot.pipe(Layer.provide(StoragePaths.fromRoot(root))))
      )
      const shot = yield* capturer.capture({ runId: testRunId, iteration: 2, htmlPath: page })

      expect(shot.url).toBe(`/static/runs/${testRunId}/screenshots/snap_2.html`)
      expect(shot.path).toBe(path.join(root, "runs", testRunId, "screenshots", "snap_2.html"))
      expect(yield* fs.readFileString(shot.path)).toBe("<h1>v2</h1>")
    }).pipe(Effect.scoped, Effect.provide(NodeContext.layer)))

  it.effect("a missing page is a transient failure", () =>
    Effect.gen(function*() {
      const fs = yield* FileSystem.FileSystem
      const root = yield* fs.makeTempDirectoryScoped()
      const capturer = yield* ScreenshotCapturer.pipe(
        Effect.provide(ScreenshotCapturer.htmlSnapshot.pipe(Layer.provide(StoragePaths.fromRoot(root))))
      )
      const error = yield* Effect.flip(
        capturer.capture({ runId: testRunId, iteration: 1, htmlPath: `${root}/missing.html` })
      )
      expect(error._tag).toBe("TransientCollaboratorError")
    }).pipe(Effect.scoped, Effect.provide(NodeContext.layer)))
})
