/**
 * FileSystem EventLog - Persists events as newline-delimited JSON.
 *
 * Storage structure:
 * - {root}/runs/{runId}/events.jsonl
 * - One encoded RunEvent per line, in publish order
 */

import { FileSystem } from "@effect/platform"
import { Effect, Layer, Option, Schema } from "effect"
import { EventLogError, type RunEvent, RunEventJson, RunId } from "./domain.ts"
import { EventLog } from "./event-log.ts"
import { StoragePaths } from "./paths.ts"

const encodeLine = Schema.encode(RunEventJson)
const decodeLine = Schema.decodeUnknown(RunEventJson)
const isRunId = Schema.is(RunId)

/**
 * FileSystem-backed EventLog layer.
 * Requires StoragePaths and FileSystem services.
 */
export const EventLogFileSystem: Layer.Layer<
  EventLog,
  never,
  StoragePaths | FileSystem.FileSystem
> = Layer.effect(
  EventLog,
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const paths = yield* StoragePaths

    const append = (runId: RunId, event: RunEvent) =>
      Effect.gen(function*() {
        const line = yield* encodeLine(event)
        yield* fs.makeDirectory(paths.runDir(runId), { recursive: true })
        yield* fs.writeFileString(paths.eventsFile(runId), `${line}\n`, { flag: "a" })
      }).pipe(
        Effect.mapError((error) =>
          new EventLogError({
            runId,
            message: `Failed to append ${event.t} (seq ${event.seq})`,
            cause: Option.some(error)
          })
        )
      )

    const read = (runId: RunId) =>
      Effect.gen(function*() {
        const filePath = paths.eventsFile(runId)
        const fileExists = yield* fs.exists(filePath).pipe(
          Effect.mapError((error) =>
            new EventLogError({ runId, message: "Failed to check event log existence", cause: Option.some(error) })
          )
        )

        if (!fileExists) {
          return [] as ReadonlyArray<RunEvent>
        }

        const content = yield* fs.readFileString(filePath).pipe(
          Effect.mapError((error) =>
            new EventLogError({ runId, message: "Failed to read event log", cause: Option.some(error) })
          )
        )

        // Every append ends with a newline, so text after the last one is a write cut short
        const lines = content.split("\n")
        const tail = lines.pop() ?? ""
        const events = yield* Effect.forEach(
          lines.flatMap((line, index) => line.trim() === "" ? [] : [{ line, number: index + 1 }]),
          ({ line, number }) =>
            decodeLine(line).pipe(
              Effect.mapError((error) =>
                new EventLogError({ runId, message: `Malformed event on line ${number}`, cause: Option.some(error) })
              )
            )
        )
        if (tail.trim() === "") return events

        const last = yield* Effect.option(decodeLine(tail))
        if (Option.isNone(last)) {
          yield* Effect.logWarning("Ignoring unterminated last line of event log").pipe(
            Effect.annotateLogs({ runId, line: lines.length + 1 })
          )
          return events
        }
        return [...events, last.value]
      })

    const exists = (runId: RunId) =>
      fs.exists(paths.eventsFile(runId)).pipe(
        Effect.catchAll(() => Effect.succeed(false))
      )

    const list = () =>
      Effect.gen(function*() {
        const dirExists = yield* fs.exists(paths.runsDir)
        if (!dirExists) return [] as ReadonlyArray<RunId>
        const entries = (yield* fs.readDirectory(paths.runsDir)).filter((entry): entry is RunId => isRunId(entry))
        const withLogs = yield* Effect.filter(entries, (runId) => fs.exists(paths.eventsFile(runId)))
        return withLogs.sort()
      }).pipe(
        Effect.catchAll((error) =>
          Effect.logWarning("Failed to list runs", { error }).pipe(Effect.as([] as ReadonlyArray<RunId>))
        )
      )

    return new EventLog({ append, read, exists, list })
  })
)
