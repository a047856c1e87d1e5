/**
 * EventLog - Append-only record of every event of a run.
 *
 * Pluggable implementations:
 * - InMemory: For tests (fresh state per layer creation)
 * - FileSystem: For production (JSONL file per run, see event-log-fs.ts)
 */

import { Effect, Layer } from "effect"
import type { EventLogError, RunEvent, RunId } from "./domain.ts"

/**
 * EventLog persists run events in publish order.
 * `read` yields events in exactly the order they were appended.
 */
export class EventLog extends Effect.Service<EventLog>()("@iteration-engine/EventLog", {
  succeed: {
    append: (_runId: RunId, _event: RunEvent): Effect.Effect<void, EventLogError> => Effect.void,
    read: (_runId: RunId): Effect.Effect<ReadonlyArray<RunEvent>, EventLogError> => Effect.succeed([]),
    exists: (_runId: RunId): Effect.Effect<boolean> => Effect.succeed(false),
    list: (): Effect.Effect<ReadonlyArray<RunId>> => Effect.succeed([])
  },
  accessors: true
}) {
  /**
   * In-memory implementation for tests.
   * Fresh state per layer creation ensures test isolation.
   */
  static readonly InMemory: Layer.Layer<EventLog> = Layer.sync(EventLog, () => {
    const store = new Map<RunId, Array<RunEvent>>()

    return new EventLog({
      append: (runId: RunId, event: RunEvent) =>
        Effect.sync(() => {
          const existing = store.get(runId) ?? []
          store.set(runId, [...existing, event])
        }),

      read: (runId: RunId) => Effect.sync((): ReadonlyArray<RunEvent> => store.get(runId) ?? []),

      exists: (runId: RunId) => Effect.sync(() => store.has(runId)),

      list: () => Effect.sync((): ReadonlyArray<RunId> => Array.from(store.keys()).sort())
    })
  })
}
