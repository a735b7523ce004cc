/**
 * Karabiner profile assembly.
 *
 * Wraps compiled manipulators into the complex-modification document
 * Karabiner-Elements imports:
 *
 *   { "title": "...", "rules": [{ "description": "...", "manipulators": [...] }] }
 *
 * Entries keep the order they are given in. Karabiner applies the first
 * matching manipulator, so layer- and app-scoped entries belong before the
 * global defaults for the same button.
 */

import { compileScopedRule } from "../rules/compilers.js";
import type { ButtonConfigInput, DeviceIds, Manipulator } from "../rules/types.js";

/** One button in a rule group, with the scope it applies in. */
export interface ProfileEntry {
  button: ButtonConfigInput;
  /** Frontmost application bundle id pattern(s). */
  app?: string | string[];
  /** Layer variable that must be active. */
  layer?: string;
  layerValue?: number;
}

export interface RuleGroupSpec {
  description: string;
  entries: ProfileEntry[];
}

export interface ProfileSpec {
  title: string;
  /** Restricts every manipulator to one device. */
  device?: DeviceIds;
  rules: RuleGroupSpec[];
}

export interface RuleGroupJson {
  description: string;
  manipulators: Manipulator[];
}

export interface ProfileJson {
  title: string;
  rules: RuleGroupJson[];
}

function compileGroup(group: RuleGroupSpec, index: number, device?: DeviceIds): RuleGroupJson {
  if (!group.description.trim()) {
    throw new Error(`Rule group ${index + 1}: description must not be empty`);
  }
  if (group.entries.length === 0) {
    throw new Error(`Rule group "${group.description}": needs at least one entry`);
  }

  const manipulators = group.entries.map((entry) =>
    compileScopedRule(entry.button, {
      device,
      app: entry.app,
      layer: entry.layer,
      layerValue: entry.layerValue,
    }),
  );
  return { description: group.description, manipulators };
}

/** Compile every rule group of a profile, in order. */
export function buildProfile(spec: ProfileSpec): ProfileJson {
  if (!spec.title.trim()) throw new Error("Profile title must not be empty");
  if (spec.rules.length === 0) throw new Error("Profile needs at least one rule group");

  return {
    title: spec.title,
    rules: spec.rules.map((group, i) => compileGroup(group, i, spec.device)),
  };
}

/** Serialize a profile as pretty-printed JSON (2-space indent). */
export function serializeProfile(profile: ProfileJson): string {
  return JSON.stringify(profile, null, 2);
}

export function countManipulators(profile: ProfileJson): number {
  return profile.rules.reduce((sum, r) => sum + r.manipulators.length, 0);
}
