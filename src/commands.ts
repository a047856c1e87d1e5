/**
 * Inbound commands and their boundary validation.
 *
 * Commands are decoded exactly once, at the HTTP edge. Anything that fails here
 * becomes a ValidationError and never reaches the run loop.
 */

import { Effect, ParseResult, Schema } from "effect"
import { Actor, PromptContent, Route, ValidationError } from "./domain.ts"

// -----------------------------------------------------------------------------
// Control
// -----------------------------------------------------------------------------

export const ControlAction = Schema.Literal("pause", "resume")
export type ControlAction = typeof ControlAction.Type

export const ControlCommand = Schema.Struct({
  action: ControlAction
})
export type ControlCommand = typeof ControlCommand.Type

// -----------------------------------------------------------------------------
// Prompt
// -----------------------------------------------------------------------------

export const PromptCommand = Schema.Struct({
  actor: Actor,
  routeTo: Schema.propertySignature(Route).pipe(Schema.fromKey("route_to")),
  content: PromptContent
})
export type PromptCommand = typeof PromptCommand.Type

// -----------------------------------------------------------------------------
// Decoding
// -----------------------------------------------------------------------------

const toValidationError = (error: ParseResult.ParseError) =>
  new ValidationError({ message: ParseResult.TreeFormatter.formatErrorSync(error) })

const decodeControlJson = Schema.decodeUnknown(Schema.parseJson(ControlCommand))
const decodePromptJson = Schema.decodeUnknown(Schema.parseJson(PromptCommand))

/** Decode a raw request body into a ControlCommand */
export const decodeControlCommand = (body: string): Effect.Effect<ControlCommand, ValidationError> =>
  decodeControlJson(body).pipe(Effect.mapError(toValidationError))

/** Decode a raw request body into a PromptCommand */
export const decodePromptCommand = (body: string): Effect.Effect<PromptCommand, ValidationError> =>
  decodePromptJson(body).pipe(Effect.mapError(toValidationError))
