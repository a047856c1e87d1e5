/**
 * EventBus - Single publication point for run events.
 *
 * publish = append to the EventLog, then fan out to live subscribers of that run.
 * subscribe = replay the log, then continue with live events.
 *
 * Both run under one lock, so a subscriber sees every event of the run exactly once
 * and in seq order: nothing can be published between its replay and its registration.
 *
 * Each subscriber owns a bounded mailbox. A subscriber that falls `capacity` events
 * behind is disconnected with an OverflowError; the publisher never waits for it.
 */

import { Context, Effect, Layer, Mailbox, Option, type Scope, Stream } from "effect"
import { EngineSettings } from "./config.ts"
import { type EventLogError, OverflowError, type RunEvent, type RunId, SubscriberId } from "./domain.ts"
import { EventLog } from "./event-log.ts"

export interface Subscription {
  readonly id: SubscriberId
  readonly runId: RunId
  /** Replayed history followed by live events. Ends when the run completes. */
  readonly events: Stream.Stream<RunEvent, OverflowError>
}

export interface EventBusShape {
  readonly publish: (event: RunEvent) => Effect.Effect<void, EventLogError>
  readonly subscribe: (runId: RunId) => Effect.Effect<Subscription, EventLogError>
  /** subscribe, unsubscribing when the scope closes */
  readonly subscribeScoped: (runId: RunId) => Effect.Effect<Subscription, EventLogError, Scope.Scope>
  readonly unsubscribe: (subscription: Subscription) => Effect.Effect<void>
  /** Logged history only */
  readonly replay: (runId: RunId) => Effect.Effect<ReadonlyArray<RunEvent>, EventLogError>
  /** No further events for this run: live streams end after draining */
  readonly complete: (runId: RunId) => Effect.Effect<void>
  readonly subscriberCount: (runId: RunId) => Effect.Effect<number>
}

export interface EventBusOptions {
  readonly capacity: number
}

export const makeEventBus = (options: EventBusOptions) =>
  Effect.gen(function*() {
    const log = yield* EventLog
    const lock = yield* Effect.makeSemaphore(1)
    const subscribers = new Map<RunId, Map<SubscriberId, Mailbox.Mailbox<RunEvent, OverflowError>>>()
    const completed = new Set<RunId>()
    let nextSubscriber = 0

    const subscribersOf = (runId: RunId) => {
      const existing = subscribers.get(runId)
      if (existing) return existing
      const created = new Map<SubscriberId, Mailbox.Mailbox<RunEvent, OverflowError>>()
      subscribers.set(runId, created)
      return created
    }

    const disconnect = (runId: RunId, id: SubscriberId, mailbox: Mailbox.Mailbox<RunEvent, OverflowError>) =>
      Effect.gen(function*() {
        subscribersOf(runId).delete(id)
        yield* mailbox.fail(new OverflowError({ subscriberId: id, runId, capacity: options.capacity }))
        yield* Effect.logWarning("Subscriber overflowed, disconnecting").pipe(
          Effect.annotateLogs({ runId, subscriberId: id, capacity: options.capacity })
        )
      })

    const publish = (event: RunEvent) =>
      lock.withPermits(1)(
        Effect.gen(function*() {
          yield* log.append(event.runId, event)
          for (const [id, mailbox] of Array.from(subscribersOf(event.runId))) {
            const accepted = yield* mailbox.offer(event)
            if (!accepted) {
              yield* disconnect(event.runId, id, mailbox)
            }
          }
        })
      )

    const subscribe = (runId: RunId) =>
      lock.withPermits(1)(
        Effect.gen(function*() {
          const history = yield* log.read(runId)
          const id = SubscriberId.make(`sub-${++nextSubscriber}`)

          if (completed.has(runId)) {
            return { id, runId, events: Stream.fromIterable(history) } satisfies Subscription
          }

          const mailbox = yield* Mailbox.make<RunEvent, OverflowError>({
            capacity: options.capacity,
            strategy: "dropping"
          })
          subscribersOf(runId).set(id, mailbox)
          yield* Effect.logDebug("Subscriber registered").pipe(
            Effect.annotateLogs({ runId, subscriberId: id, replayed: history.length })
          )

          return {
            id,
            runId,
            events: Stream.concat(Stream.fromIterable(history), Mailbox.toStream(mailbox))
          } satisfies Subscription
        })
      )

    const unsubscribe = (subscription: Subscription) =>
      Effect.gen(function*() {
        const runSubscribers = subscribers.get(subscription.runId)
        const mailbox = Option.fromNullable(runSubscribers?.get(subscription.id))
        if (Option.isNone(mailbox)) return
        runSubscribers?.delete(subscription.id)
        yield* mailbox.value.end
        yield* Effect.logDebug("Subscriber removed").pipe(
          Effect.annotateLogs({ runId: subscription.runId, subscriberId: subscription.id })
        )
      })

    const subscribeScoped = (runId: RunId) => Effect.acquireRelease(subscribe(runId), unsubscribe)

    const complete = (runId: RunId) =>
      lock.withPermits(1)(
        Effect.gen(function*() {
          completed.add(runId)
          const runSubscribers = subscribersOf(runId)
          for (const mailbox of runSubscribers.values()) {
            yield* mailbox.end
          }
          subscribers.delete(runId)
        })
      )

    const subscriberCount = (runId: RunId) => Effect.sync(() => subscribers.get(runId)?.size ?? 0)

    return {
      publish,
      subscribe,
      subscribeScoped,
      unsubscribe,
      replay: log.read,
      complete,
      subscriberCount
    } satisfies EventBusShape
  })

export class EventBus extends Context.Tag("@iteration-engine/EventBus")<
  EventBus,
  EventBusShape
>() {
  static layer(options: EventBusOptions): Layer.Layer<EventBus, never, EventLog> {
    return Layer.effect(EventBus, makeEventBus(options))
  }

  static readonly fromSettings: Layer.Layer<EventBus, never, EventLog | EngineSettings> = Layer.effect(
    EventBus,
    Effect.flatMap(EngineSettings, (settings) => makeEventBus({ capacity: settings.subscriberCapacity }))
  )
}
