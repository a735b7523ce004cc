/**
 * Zod schemas for button blueprints, shared by compile_button and build_profile.
 */

import { z } from "zod";

const modifierList = z.array(z.string().min(1));

const actionEventSchema = z.object({
  keyCode: z.string().min(1).optional().describe('Key to press, e.g. "f", "spacebar", "button1".'),
  modifiers: modifierList.optional().describe('Modifiers for this event only, e.g. ["left_shift"].'),
  shellCommand: z.string().min(1).optional().describe("Shell command to run instead of a key press."),
  holdDownMilliseconds: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("How long to hold the key down (ms). Default: 0."),
});

export const actionSchema = z
  .object({
    keyCode: z
      .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
      .optional()
      .describe(
        'Simple mode: one key ("c") or a key list played in order (["c", "t", "v"]). ' +
          "Lists get a 20 ms hold per key.",
      ),
    modifiers: modifierList
      .optional()
      .describe('Simple mode modifiers applied to every key, e.g. ["left_command"].'),
    shellCommand: z
      .string()
      .min(1)
      .optional()
      .describe('Shell command, e.g. "open -a Safari". Takes precedence over events and keyCode.'),
    events: z
      .array(actionEventSchema)
      .optional()
      .describe("Sequence mode: ordered events with per-event modifiers and hold times. Takes precedence over keyCode."),
  })
  .describe("Output action. Exactly one of shellCommand, events or keyCode is used.");

export const buttonSchema = z.object({
  buttonId: z
    .union([z.string().min(1), z.array(z.string().min(1)).min(2)])
    .describe(
      'Input identifier. "button1".."buttonN" are mouse buttons, anything else a key code ("1", "hyphen"). ' +
        "A list is only valid for simultaneous behavior.",
    ),
  behavior: z
    .enum(["click", "modifier", "dual", "virtual", "simultaneous", "toggle"])
    .describe(
      "click: tap runs tapAction. modifier: hold sets layerVariable. " +
        "dual: tap runs tapAction, hold sets layerVariable. virtual: key becomes a layer modifier. " +
        "simultaneous: chord of buttonId list runs tapAction. toggle: not implemented.",
    ),
  tapAction: actionSchema.optional().describe("Required for click and dual."),
  layerVariable: z
    .string()
    .min(1)
    .optional()
    .describe("Layer variable name. Required for modifier, dual and virtual."),
  thresholdMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Tap/hold window in ms. Default: 200."),
  mandatoryModifiers: modifierList.optional().describe("Modifiers that must be held for the rule to match."),
  optionalModifiers: modifierList
    .optional()
    .describe('Modifiers allowed while the rule matches. Use ["any"] for layer rules.'),
  simultaneousThresholdMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Chord detection window in ms. Default: 50."),
});

export const deviceIdsSchema = {
  vendorId: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("USB vendor id (decimal). Use list_usb_devices to find it."),
  productId: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("USB product id (decimal). Both ids are needed for a device restriction."),
};

export const scopeSchema = {
  app: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .describe('Frontmost application bundle id pattern(s), e.g. "^com\\\\.google\\\\.Chrome$".'),
  layer: z.string().min(1).optional().describe("Layer variable that must be active."),
  layerValue: z.number().int().optional().describe("Required layer value. Default: 1."),
};
