/**
 * Rule compilation types.
 *
 * Three layers:
 *   1. Blueprint — what the caller describes (Action, ActionEvent, ButtonConfig)
 *   2. Loose input — all-optional shapes coming from tool calls (ActionInput, ButtonConfigInput)
 *   3. Manipulator JSON — Karabiner-Elements complex modification output (snake_case keys)
 */

// ---------------------------------------------------------------------------
// Blueprint: actions
// ---------------------------------------------------------------------------

/** One step of a sequence: a shell command, or a key press. */
export type ActionEvent =
  | { kind: "shell"; shellCommand: string }
  | {
      kind: "key";
      keyCode: string;
      modifiers: readonly string[];
      /** How long the key stays down. 0 leaves it to the engine. */
      holdDownMilliseconds: number;
    };

/** Output effect of a button. Exactly one payload kind is active. */
export type Action =
  | { kind: "shell"; shellCommand: string }
  | { kind: "sequence"; events: readonly ActionEvent[] }
  | {
      kind: "keys";
      /** Single key, or a list played back in order (legacy macro mode). */
      keyCode: string | readonly string[];
      /** Applied to every key in the list. */
      modifiers: readonly string[];
    };

// ---------------------------------------------------------------------------
// Blueprint: buttons
// ---------------------------------------------------------------------------

export type ButtonBehavior =
  | "click"
  | "modifier"
  | "dual"
  | "virtual"
  | "simultaneous"
  | "toggle";

export const BUTTON_BEHAVIORS: readonly ButtonBehavior[] = [
  "click",
  "modifier",
  "dual",
  "virtual",
  "simultaneous",
  "toggle",
];

interface ButtonConfigBase {
  /** Tap/hold discrimination window (to_if_alone timeout). */
  thresholdMs: number;
  /** Hardware modifiers that must be held for the rule to match. */
  mandatoryModifiers: readonly string[];
  /** Modifiers allowed (but not required) while the rule matches, e.g. ["any"]. */
  optionalModifiers: readonly string[];
  /** Chord detection window. Only emitted for simultaneous buttons. */
  simultaneousThresholdMs: number;
}

export interface ClickButton extends ButtonConfigBase {
  behavior: "click";
  buttonId: string;
  tapAction: Action;
}

export interface ModifierButton extends ButtonConfigBase {
  behavior: "modifier";
  buttonId: string;
  layerVariable: string;
}

export interface DualButton extends ButtonConfigBase {
  behavior: "dual";
  buttonId: string;
  tapAction: Action;
  layerVariable: string;
}

export interface VirtualButton extends ButtonConfigBase {
  behavior: "virtual";
  buttonId: string;
  layerVariable: string;
  tapAction?: Action;
}

export interface SimultaneousButton extends ButtonConfigBase {
  behavior: "simultaneous";
  buttonId: readonly string[];
  tapAction?: Action;
}

export interface ToggleButton extends ButtonConfigBase {
  behavior: "toggle";
  buttonId: string;
  layerVariable?: string;
}

export type ButtonConfig =
  | ClickButton
  | ModifierButton
  | DualButton
  | VirtualButton
  | SimultaneousButton
  | ToggleButton;

/** Hardware identifiers from device discovery. Either missing means "any device". */
export interface DeviceIds {
  vendorId?: number;
  productId?: number;
}

// ---------------------------------------------------------------------------
// Loose input (tool calls, JSON files)
// ---------------------------------------------------------------------------

export interface ActionEventInput {
  keyCode?: string;
  modifiers?: string[];
  shellCommand?: string;
  holdDownMilliseconds?: number;
}

export interface ActionInput {
  keyCode?: string | string[];
  modifiers?: string[];
  shellCommand?: string;
  events?: ActionEventInput[];
}

export interface ButtonConfigInput {
  buttonId: string | string[];
  behavior: ButtonBehavior;
  tapAction?: ActionInput;
  layerVariable?: string;
  thresholdMs?: number;
  mandatoryModifiers?: string[];
  optionalModifiers?: string[];
  simultaneousThresholdMs?: number;
}

// ---------------------------------------------------------------------------
// Manipulator JSON
// ---------------------------------------------------------------------------

export type InputIdentifier =
  | { pointing_button: string }
  | { key_code: string };

export interface SetVariableEvent {
  set_variable: { name: string; value: number };
}

export interface ShellCommandEvent {
  shell_command: string;
}

export type KeyEventJson = InputIdentifier & {
  modifiers?: string[];
  hold_down_milliseconds?: number;
};

export type ToEvent = ShellCommandEvent | KeyEventJson | SetVariableEvent;

export interface FromModifiers {
  mandatory?: string[];
  optional?: string[];
}

export interface SimultaneousOptions {
  key_down_order: "insensitive";
  detect_key_down_uninterruptedly: boolean;
}

export type FromBlock = (
  | InputIdentifier
  | { simultaneous: InputIdentifier[]; simultaneous_options: SimultaneousOptions }
) & { modifiers?: FromModifiers };

export interface DeviceCondition {
  type: "device_if";
  identifiers: Array<{ vendor_id: number; product_id: number }>;
}

export interface AppCondition {
  type: "frontmost_application_if";
  bundle_identifiers: string[];
}

export interface VariableCondition {
  type: "variable_if";
  name: string;
  value: number;
}

export type Condition = DeviceCondition | AppCondition | VariableCondition;

export interface ManipulatorParameters {
  "basic.to_if_alone_timeout_milliseconds"?: number;
  "basic.simultaneous_threshold_milliseconds"?: number;
}

export interface Manipulator {
  type: "basic";
  from: FromBlock;
  to?: ToEvent[];
  to_after_key_up?: ToEvent[];
  to_if_alone?: ToEvent[];
  conditions?: Condition[];
  parameters?: ManipulatorParameters;
}
