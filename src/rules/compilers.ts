/**
 * Behavior compilers — one per ButtonBehavior — and the dispatcher.
 *
 * Each compiler starts from a base manipulator (from-block + optional device
 * restriction) and fills the behavior's output slots:
 *
 *   click         to
 *   modifier      to / to_after_key_up (+ to_if_alone re-click for mouse buttons)
 *   dual          to / to_after_key_up / to_if_alone + alone timeout
 *   virtual       same as dual, tap action optional
 *   simultaneous  to (chord lives in the from-block) + chord window
 *   toggle        not implemented, always throws
 */

import { serializeAction } from "./action.js";
import { buttonLabel, defineButton } from "./button.js";
import { addAppRestriction, addLayerCondition, deviceCondition, LAYER_OFF, LAYER_ON } from "./conditions.js";
import { buildFromBlock } from "./from-block.js";
import { classifyIdentifier, isPointingButton } from "./identifier.js";
import type {
  ButtonConfig,
  ButtonConfigInput,
  ClickButton,
  DeviceIds,
  DualButton,
  Manipulator,
  ModifierButton,
  SetVariableEvent,
  SimultaneousButton,
  ToggleButton,
  VirtualButton,
} from "./types.js";

export const ALONE_TIMEOUT_PARAM = "basic.to_if_alone_timeout_milliseconds";
export const SIMULTANEOUS_THRESHOLD_PARAM = "basic.simultaneous_threshold_milliseconds";

/** Where a compiled rule applies. Conditions are added in field order: device, app, layer. */
export interface RuleScope {
  device?: DeviceIds;
  /** Bundle identifier pattern(s) of the frontmost application. */
  app?: string | readonly string[];
  /** Layer variable that must be active. */
  layer?: string;
  /** Required layer value. Default: 1. */
  layerValue?: number;
}

function baseManipulator(config: ButtonConfig, device?: DeviceIds): Manipulator {
  const manipulator: Manipulator = { type: "basic", from: buildFromBlock(config) };
  const condition = deviceCondition(device);
  if (condition) manipulator.conditions = [condition];
  return manipulator;
}

function setVariable(name: string, value: number): SetVariableEvent {
  return { set_variable: { name, value } };
}

/** Layer on while held, off after release. */
function holdLayer(manipulator: Manipulator, layerVariable: string): void {
  manipulator.to = [setVariable(layerVariable, LAYER_ON)];
  manipulator.to_after_key_up = [setVariable(layerVariable, LAYER_OFF)];
}

// ---------------------------------------------------------------------------
// Compilers
// ---------------------------------------------------------------------------

export function compileClickRule(config: ClickButton, device?: DeviceIds): Manipulator {
  const rule = baseManipulator(config, device);
  rule.to = serializeAction(config.tapAction);
  return rule;
}

/**
 * Pure layer key. A mouse button keeps its native click when tapped briefly,
 * so the tap re-emits the button itself.
 */
export function compileModifierRule(config: ModifierButton, device?: DeviceIds): Manipulator {
  const rule = baseManipulator(config, device);
  holdLayer(rule, config.layerVariable);

  if (isPointingButton(config.buttonId)) {
    rule.to_if_alone = [classifyIdentifier(config.buttonId)];
    rule.parameters = { [ALONE_TIMEOUT_PARAM]: config.thresholdMs };
  }
  return rule;
}

/** Tap for the action, hold for the layer. */
export function compileDualRule(config: DualButton, device?: DeviceIds): Manipulator {
  const rule = baseManipulator(config, device);
  holdLayer(rule, config.layerVariable);
  rule.to_if_alone = serializeAction(config.tapAction);
  rule.parameters = { [ALONE_TIMEOUT_PARAM]: config.thresholdMs };
  return rule;
}

/** Turns an ordinary key (e.g. spacebar) into a variable-backed modifier. */
export function compileVirtualModifierRule(config: VirtualButton, device?: DeviceIds): Manipulator {
  const rule = baseManipulator(config, device);
  holdLayer(rule, config.layerVariable);
  if (config.tapAction) rule.to_if_alone = serializeAction(config.tapAction);
  rule.parameters = { [ALONE_TIMEOUT_PARAM]: config.thresholdMs };
  return rule;
}

export function compileSimultaneousRule(config: SimultaneousButton, device?: DeviceIds): Manipulator {
  const rule = baseManipulator(config, device);
  if (config.tapAction) rule.to = serializeAction(config.tapAction);
  rule.parameters = { [SIMULTANEOUS_THRESHOLD_PARAM]: config.simultaneousThresholdMs };
  return rule;
}

/**
 * Toggling needs state carried between presses, which a single stateless
 * manipulator cannot express.
 */
export function compileToggleRule(config: ToggleButton): never {
  throw new Error(`Button "${buttonLabel(config.buttonId)}": toggle behavior is not implemented`);
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

/** Compile an already validated blueprint. */
export function compileButton(config: ButtonConfig, device?: DeviceIds): Manipulator {
  switch (config.behavior) {
    case "click":
      return compileClickRule(config, device);
    case "modifier":
      return compileModifierRule(config, device);
    case "dual":
      return compileDualRule(config, device);
    case "virtual":
      return compileVirtualModifierRule(config, device);
    case "simultaneous":
      return compileSimultaneousRule(config, device);
    case "toggle":
      return compileToggleRule(config);
  }
}

/**
 * Validate a loose button description and compile it into one manipulator.
 * Throws before returning anything when the description is invalid.
 */
export function compileRule(input: ButtonConfigInput, device?: DeviceIds): Manipulator {
  return compileButton(defineButton(input), device);
}

/** Compile, then scope the rule to an application and/or layer (in that order). */
export function compileScopedRule(input: ButtonConfigInput, scope: RuleScope = {}): Manipulator {
  const rule = compileRule(input, scope.device);
  addAppRestriction(rule, scope.app);
  if (scope.layer) addLayerCondition(rule, scope.layer, scope.layerValue);
  return rule;
}
