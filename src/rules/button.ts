/**
 * Button blueprint validation.
 *
 * defineButton() turns a loose ButtonConfigInput into the ButtonConfig union,
 * filling defaults and rejecting fields a behavior does not accept.
 * Every error names the button and the offending field.
 */

import { createAction } from "./action.js";
import type {
  Action,
  ActionInput,
  ButtonBehavior,
  ButtonConfig,
  ButtonConfigInput,
} from "./types.js";
import { BUTTON_BEHAVIORS } from "./types.js";

export const DEFAULT_THRESHOLD_MS = 200;
export const DEFAULT_SIMULTANEOUS_THRESHOLD_MS = 50;

/** Printable label for error messages: "button3" or "[1, 2]". */
export function buttonLabel(buttonId: string | readonly string[]): string {
  return typeof buttonId === "string" ? buttonId : `[${buttonId.join(", ")}]`;
}

function fail(buttonId: string | readonly string[], message: string): never {
  throw new Error(`Button "${buttonLabel(buttonId)}": ${message}`);
}

function positiveInteger(
  buttonId: string | readonly string[],
  field: string,
  value: number | undefined,
  fallback: number,
): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value <= 0) {
    fail(buttonId, `${field} must be a positive integer, got ${value}`);
  }
  return value;
}

function singleId(input: ButtonConfigInput): string {
  if (typeof input.buttonId !== "string") {
    fail(
      input.buttonId,
      `${input.behavior} behavior requires a single button identifier (lists are only valid for simultaneous)`,
    );
  }
  if (!input.buttonId) fail(input.buttonId, "button_id must not be empty");
  return input.buttonId;
}

function action(input: ButtonConfigInput, tapAction: ActionInput): Action {
  try {
    return createAction(tapAction);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    return fail(input.buttonId, `invalid tap_action: ${msg}`);
  }
}

function requireTapAction(input: ButtonConfigInput): Action {
  if (!input.tapAction) {
    fail(input.buttonId, `missing tap_action (required for ${input.behavior} behavior)`);
  }
  return action(input, input.tapAction);
}

function optionalTapAction(input: ButtonConfigInput): Action | undefined {
  return input.tapAction ? action(input, input.tapAction) : undefined;
}

function requireLayerVariable(input: ButtonConfigInput): string {
  if (!input.layerVariable) {
    fail(input.buttonId, `missing layer_variable (required for ${input.behavior} behavior)`);
  }
  return input.layerVariable;
}

function rejectField(
  input: ButtonConfigInput,
  field: "tap_action" | "layer_variable",
  value: unknown,
): void {
  if (value !== undefined) {
    fail(input.buttonId, `${field} is not used by ${input.behavior} behavior`);
  }
}

function isBehavior(value: string): value is ButtonBehavior {
  return (BUTTON_BEHAVIORS as readonly string[]).includes(value);
}

/**
 * Validate a loose button description and return the typed blueprint.
 * Throws on the first violated invariant.
 */
export function defineButton(input: ButtonConfigInput): ButtonConfig {
  if (!isBehavior(input.behavior)) {
    fail(
      input.buttonId,
      `unknown behavior "${input.behavior}". Valid: ${BUTTON_BEHAVIORS.join(", ")}`,
    );
  }

  // Toggle is never compiled, whatever the other fields hold.
  if (input.behavior === "toggle") {
    fail(input.buttonId, "toggle behavior is not implemented");
  }

  const base = {
    thresholdMs: positiveInteger(input.buttonId, "threshold_ms", input.thresholdMs, DEFAULT_THRESHOLD_MS),
    mandatoryModifiers: [...(input.mandatoryModifiers ?? [])],
    optionalModifiers: [...(input.optionalModifiers ?? [])],
    simultaneousThresholdMs: positiveInteger(
      input.buttonId,
      "simultaneous_threshold_ms",
      input.simultaneousThresholdMs,
      DEFAULT_SIMULTANEOUS_THRESHOLD_MS,
    ),
  };

  switch (input.behavior) {
    case "click":
      rejectField(input, "layer_variable", input.layerVariable);
      return { ...base, behavior: "click", buttonId: singleId(input), tapAction: requireTapAction(input) };

    case "modifier":
      rejectField(input, "tap_action", input.tapAction);
      return {
        ...base,
        behavior: "modifier",
        buttonId: singleId(input),
        layerVariable: requireLayerVariable(input),
      };

    case "dual":
      return {
        ...base,
        behavior: "dual",
        buttonId: singleId(input),
        tapAction: requireTapAction(input),
        layerVariable: requireLayerVariable(input),
      };

    case "virtual":
      return {
        ...base,
        behavior: "virtual",
        buttonId: singleId(input),
        layerVariable: requireLayerVariable(input),
        tapAction: optionalTapAction(input),
      };

    case "simultaneous": {
      const ids = input.buttonId;
      if (typeof ids === "string") {
        fail(ids, "simultaneous behavior requires a list of button identifiers");
      }
      if (ids.length < 2) {
        fail(ids, `simultaneous behavior requires at least 2 button identifiers, got ${ids.length}`);
      }
      if (ids.some((id) => !id)) fail(ids, "button_id list must not contain empty entries");
      rejectField(input, "layer_variable", input.layerVariable);
      return {
        ...base,
        behavior: "simultaneous",
        buttonId: [...ids],
        tapAction: optionalTapAction(input),
      };
    }
  }
}
