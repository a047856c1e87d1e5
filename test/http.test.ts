/**
 * HTTP Route Tests
 *
 * The router runs in process through a web handler; no port is opened.
 */
import { HttpApp } from "@effect/platform"
import { describe, expect, it } from "@effect/vitest"
import { Chunk, Effect, Option, Stream } from "effect"
import { OverflowError, type RunEvent, SubscriberId } from "../src/domain.ts"
import { makeRouter, toSseStream } from "../src/http.ts"
import { RunManager } from "../src/run-manager.ts"
import { iterationMarker } from "../src/workspace.ts"
import { awaitCurrentRun, makeEngineLayer, sampleHistory, testRunId } from "./fixtures.ts"

interface Reply {
  readonly status: number
  readonly body: unknown
}

type Call = (path: string, init?: RequestInit) => Effect.Effect<Reply>

/** Give `body` a client for the router, bound to the RunManager in context */
const withApi = <A, E>(
  body: (call: Call, raw: (path: string) => Effect.Effect<Response>) => Effect.Effect<A, E, RunManager>
) =>
  Effect.gen(function*() {
    const runtime = yield* Effect.runtime<RunManager>()
    const handler = HttpApp.toWebHandlerRuntime(runtime)(makeRouter)
    const raw = (path: string, init?: RequestInit) =>
      Effect.promise(() => handler(new Request(`http://localhost${path}`, init)))
    const call: Call = (path, init) =>
      Effect.flatMap(raw(path, init), (response) =>
        Effect.promise(async (): Promise<Reply> => ({ status: response.status, body: await response.json() })))
    return yield* body(call, (path) => raw(path))
  })

const post = (body: string): RequestInit => ({
  method: "POST",
  headers: { "content-type": "application/json" },
  body
})

const budget = (iterations: number) => makeEngineLayer({ settings: { maxIterations: Option.some(iterations) } })

describe("HTTP API", () => {
  it.effect("GET /api/health", () =>
    withApi((call) =>
      Effect.gen(function*() {
        const reply = yield* call("/api/health")
        expect(reply).toEqual({ status: 200, body: { status: "ok" } })
      })
    ).pipe(Effect.provide(budget(0))))

  it.effect("GET /api/state before any run", () =>
    withApi((call) =>
      Effect.gen(function*() {
        const reply = yield* call("/api/state")
        expect(reply.status).toBe(200)
        expect(reply.body).toEqual({
          lifecycle: "Idle",
          run_id: null,
          projection: {
            run_id: null,
            lifecycle: "Idle",
            next_seq: 0,
            iteration: 0,
            completed_iterations: 0,
            last_response: null,
            last_screenshot_url: null,
            last_error: null
          }
        })
      })
    ).pipe(Effect.provide(budget(0))))

  describe("POST /api/control", () => {
    it.effect("rejects malformed JSON with 422", () =>
      withApi((call) =>
        Effect.gen(function*() {
          const reply = yield* call("/api/control", post("{pause"))
          expect(reply.status).toBe(422)
          expect(reply.body).toMatchObject({ ok: false, error: "ValidationError" })
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("rejects unknown actions with 422", () =>
      withApi((call) =>
        Effect.gen(function*() {
          const reply = yield* call("/api/control", post(`{"action":"rewind"}`))
          expect(reply.status).toBe(422)
          expect(reply.body).toMatchObject({ ok: false, error: "ValidationError" })
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("answers 409 when no run was started", () =>
      withApi((call) =>
        Effect.gen(function*() {
          const reply = yield* call("/api/control", post(`{"action":"pause"}`))
          expect(reply).toEqual({
            status: 409,
            body: { ok: false, error: "NoActiveRunError", message: "No run has been started" }
          })
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("pauses the current run", () =>
      withApi((call) =>
        Effect.gen(function*() {
          yield* call("/api/runs", { method: "POST" })
          const reply = yield* call("/api/control", post(`{"action":"pause"}`))
          expect(reply).toEqual({ status: 200, body: { ok: true } })
        })
      ).pipe(Effect.provide(makeEngineLayer())))
  })

  describe("POST /api/prompt", () => {
    it.effect("queues a prompt for the running run", () =>
      withApi((call) =>
        Effect.gen(function*() {
          yield* call("/api/runs", { method: "POST" })
          yield* call("/api/control", post(`{"action":"pause"}`))
          const reply = yield* call(
            "/api/prompt",
            post(JSON.stringify({ actor: "user", route_to: "code", content: ["add a footer"] }))
          )
          expect(reply).toEqual({ status: 200, body: { ok: true } })
        })
      ).pipe(Effect.provide(makeEngineLayer())))

    it.effect("answers 409 once the run has stopped", () =>
      withApi((call) =>
        Effect.gen(function*() {
          yield* call("/api/runs", { method: "POST" })
          yield* awaitCurrentRun
          const reply = yield* call(
            "/api/prompt",
            post(JSON.stringify({ actor: "user", route_to: "code", content: ["too late"] }))
          )
          expect(reply.status).toBe(409)
          expect(reply.body).toMatchObject({ ok: false, error: "RunStoppedError" })
        })
      ).pipe(Effect.provide(budget(0))))
  })

  describe("runs", () => {
    it.effect("POST /api/runs starts a run and GET /api/runs lists it", () =>
      withApi((call) =>
        Effect.gen(function*() {
          const started = yield* call("/api/runs", { method: "POST" })
          expect(started.status).toBe(200)
          const runId = yield* Effect.map(RunManager.status, (status) => Option.getOrNull(status.runId))
          expect(started.body).toEqual({ ok: true, run_id: runId })

          yield* awaitCurrentRun
          const listed = yield* call("/api/runs")
          expect(listed).toEqual({ status: 200, body: { runs: [runId] } })
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("POST /api/runs answers 409 while a run is active", () =>
      withApi((call) =>
        Effect.gen(function*() {
          yield* call("/api/runs", { method: "POST" })
          yield* call("/api/control", post(`{"action":"pause"}`))
          const reply = yield* call("/api/runs", { method: "POST" })
          expect(reply.status).toBe(409)
          expect(reply.body).toMatchObject({ ok: false, error: "RunAlreadyActiveError" })
        })
      ).pipe(Effect.provide(makeEngineLayer())))

    it.effect("GET /api/runs/:runId/events returns the logged events", () =>
      withApi((call) =>
        Effect.gen(function*() {
          yield* call("/api/runs", { method: "POST" })
          yield* awaitCurrentRun
          const runId = yield* Effect.map(RunManager.status, (status) => Option.getOrElse(status.runId, () => ""))

          const reply = yield* call(`/api/runs/${runId}/events`)
          expect(reply.status).toBe(200)
          expect(reply.body).toMatchObject([
            { t: "run.started", run_id: runId, seq: 0 },
            { t: "run.completed", run_id: runId, seq: 1, iterations: 0 }
          ])
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("GET /api/runs/:runId/events answers 404 for an unknown run", () =>
      withApi((call) =>
        Effect.gen(function*() {
          const reply = yield* call("/api/runs/2020-01-01T00-00-00-000Z_none/events")
          expect(reply).toEqual({
            status: 404,
            body: { ok: false, error: "RunNotFoundError", message: "Run 2020-01-01T00-00-00-000Z_none not found" }
          })
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("GET /api/runs/:runId/events rejects ids outside the run id alphabet", () =>
      withApi((call) =>
        Effect.gen(function*() {
          const reply = yield* call("/api/runs/not.a.run/events")
          expect(reply.status).toBe(422)
          expect(reply.body).toMatchObject({ ok: false, error: "ValidationError" })
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("GET /api/runs/:runId/workspace lists the page", () =>
      withApi((call) =>
        Effect.gen(function*() {
          yield* call("/api/runs", { method: "POST" })
          yield* awaitCurrentRun
          const runId = yield* Effect.map(RunManager.status, (status) => Option.getOrElse(status.runId, () => ""))

          const reply = yield* call(`/api/runs/${runId}/workspace`)
          expect(reply).toEqual({
            status: 200,
            body: {
              run_id: runId,
              tree: [{ path: "index.html", is_dir: false, size: `<!doctype html>${iterationMarker(1)}`.length, mtime: 0 }]
            }
          })
        })
      ).pipe(Effect.provide(budget(1))))
  })

  describe("GET /api/events", () => {
    it.effect("answers 404 when no run was started", () =>
      withApi((call) =>
        Effect.gen(function*() {
          const reply = yield* call("/api/events")
          expect(reply.status).toBe(404)
          expect(reply.body).toMatchObject({ ok: false, error: "NoActiveRunError" })
        })
      ).pipe(Effect.provide(budget(0))))

    it.effect("streams the run as server-sent events", () =>
      withApi((call, raw) =>
        Effect.gen(function*() {
          yield* call("/api/runs", { method: "POST" })
          const response = yield* raw("/api/events")
          expect(response.status).toBe(200)
          expect(response.headers.get("content-type")).toBe("text/event-stream")

          const text = yield* Effect.promise(() => response.text())
          const messages = text.split("\n\n").filter((chunk) => chunk !== "")
          expect(messages.every((message) => message.startsWith("data: "))).toBe(true)
          const parsed: Array<unknown> = messages.map((message) => JSON.parse(message.slice("data: ".length)))
          expect(parsed).toMatchObject([
            { t: "run.started", seq: 0 },
            { t: "run.completed", seq: 1, iterations: 0 }
          ])
        })
      ).pipe(Effect.provide(budget(0))))
  })
})

describe("toSseStream", () => {
  const frames = (events: Stream.Stream<RunEvent, OverflowError>) =>
    toSseStream(events).pipe(
      Stream.map((bytes) => new TextDecoder().decode(bytes)),
      Stream.runCollect,
      Effect.map(Chunk.toReadonlyArray)
    )

  it.effect("writes one data frame per event", () =>
    Effect.gen(function*() {
      const all = yield* frames(Stream.fromIterable(sampleHistory()))
      expect(all).toHaveLength(4)
      expect(all.every((frame) => frame.startsWith("data: {") && frame.endsWith("}\n\n"))).toBe(true)
      expect(all[0]).toContain(`"t":"run.started"`)
    }))

  it.effect("ends with an error frame when the subscriber overflows", () =>
    Effect.gen(function*() {
      const overflow = new OverflowError({ subscriberId: SubscriberId.make("sub-1"), runId: testRunId, capacity: 2 })
      const all = yield* frames(Stream.concat(Stream.fromIterable(sampleHistory().slice(0, 1)), Stream.fail(overflow)))
      expect(all).toHaveLength(2)
      expect(all[1]).toBe(
        `event: error\ndata: {"error":"OverflowError","message":"Subscriber sub-1 fell 2 events behind run ${testRunId}"}\n\n`
      )
    }))
})
