/**
 * Action model and serializer.
 *
 * An Action is one of three payloads:
 *   - shell:    run a command
 *   - sequence: ordered ActionEvents, each with its own modifiers and hold time
 *   - keys:     one key or a key list sharing the same modifiers (legacy mode)
 *
 * serializeAction() turns it into Karabiner `to` events, keeping input order.
 */

import { classifyIdentifier } from "./identifier.js";
import type {
  Action,
  ActionEvent,
  ActionEventInput,
  ActionInput,
  KeyEventJson,
  ToEvent,
} from "./types.js";

/** Hold applied to every key of a legacy key-list macro so playback stays reliable. */
export const MACRO_KEY_HOLD_MS = 20;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function shellAction(shellCommand: string): Action {
  return { kind: "shell", shellCommand };
}

export function keyAction(
  keyCode: string | readonly string[],
  modifiers: readonly string[] = [],
): Action {
  return {
    kind: "keys",
    keyCode: typeof keyCode === "string" ? keyCode : [...keyCode],
    modifiers: [...modifiers],
  };
}

export function sequenceAction(events: readonly ActionEvent[]): Action {
  return { kind: "sequence", events: [...events] };
}

export function shellEvent(shellCommand: string): ActionEvent {
  return { kind: "shell", shellCommand };
}

export function keyEvent(
  keyCode: string,
  modifiers: readonly string[] = [],
  holdDownMilliseconds = 0,
): ActionEvent {
  if (!Number.isInteger(holdDownMilliseconds) || holdDownMilliseconds < 0) {
    throw new Error(
      `hold_down_milliseconds must be a non-negative integer, got ${holdDownMilliseconds}`,
    );
  }
  return { kind: "key", keyCode, modifiers: [...modifiers], holdDownMilliseconds };
}

/**
 * Build an ActionEvent from loose input.
 * A shell command wins over a key code; an event with neither is rejected.
 */
export function createActionEvent(input: ActionEventInput): ActionEvent {
  if (input.shellCommand) return shellEvent(input.shellCommand);
  if (input.keyCode) {
    return keyEvent(input.keyCode, input.modifiers, input.holdDownMilliseconds);
  }
  throw new Error("action event needs a key_code or a shell_command");
}

/**
 * Build an Action from loose input.
 * Precedence: shell_command > events (non-empty) > key_code.
 */
export function createAction(input: ActionInput): Action {
  if (input.shellCommand) return shellAction(input.shellCommand);

  if (input.events && input.events.length > 0) {
    return sequenceAction(input.events.map(createActionEvent));
  }

  const { keyCode } = input;
  if (typeof keyCode === "string" && keyCode) {
    return keyAction(keyCode, input.modifiers);
  }
  if (Array.isArray(keyCode) && keyCode.length > 0) {
    if (keyCode.some((k) => !k)) {
      throw new Error("key_code list must not contain empty entries");
    }
    return keyAction(keyCode, input.modifiers);
  }

  throw new Error("action needs a shell_command, events, or key_code");
}

// ---------------------------------------------------------------------------
// Serializer
// ---------------------------------------------------------------------------

function keyEventJson(
  keyCode: string,
  modifiers: readonly string[],
  holdDownMilliseconds: number,
): KeyEventJson {
  const payload: KeyEventJson = { ...classifyIdentifier(keyCode) };
  if (modifiers.length > 0) payload.modifiers = [...modifiers];
  if (holdDownMilliseconds > 0) payload.hold_down_milliseconds = holdDownMilliseconds;
  return payload;
}

/** Serialize an Action into an ordered list of Karabiner `to` events. */
export function serializeAction(action: Action): ToEvent[] {
  switch (action.kind) {
    case "shell":
      return [{ shell_command: action.shellCommand }];

    case "sequence":
      return action.events.map((event): ToEvent =>
        event.kind === "shell"
          ? { shell_command: event.shellCommand }
          : keyEventJson(event.keyCode, event.modifiers, event.holdDownMilliseconds),
      );

    case "keys": {
      const keys = typeof action.keyCode === "string" ? [action.keyCode] : action.keyCode;
      const hold = keys.length > 1 ? MACRO_KEY_HOLD_MS : 0;
      return keys.map((k) => keyEventJson(k, action.modifiers, hold));
    }
  }
}
