/**
 * From-block builder: the trigger side of a manipulator.
 */

import { classifyIdentifier } from "./identifier.js";
import type { ButtonConfig, FromBlock, FromModifiers, SimultaneousOptions } from "./types.js";

/** Chord policy: any key-down order, no releases between chord members. */
export const CHORD_OPTIONS: Readonly<SimultaneousOptions> = {
  key_down_order: "insensitive",
  detect_key_down_uninterruptedly: true,
};

function fromModifiers(config: ButtonConfig): FromModifiers | undefined {
  const modifiers: FromModifiers = {};
  if (config.mandatoryModifiers.length > 0) modifiers.mandatory = [...config.mandatoryModifiers];
  if (config.optionalModifiers.length > 0) modifiers.optional = [...config.optionalModifiers];
  return modifiers.mandatory || modifiers.optional ? modifiers : undefined;
}

/**
 * Build the `from` block for a button.
 * Simultaneous buttons become a chord; every other behavior a single input.
 */
export function buildFromBlock(config: ButtonConfig): FromBlock {
  const from: FromBlock =
    config.behavior === "simultaneous"
      ? {
          simultaneous: config.buttonId.map(classifyIdentifier),
          simultaneous_options: { ...CHORD_OPTIONS },
        }
      : classifyIdentifier(config.buttonId);

  const modifiers = fromModifiers(config);
  if (modifiers) from.modifiers = modifiers;
  return from;
}
