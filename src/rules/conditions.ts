/**
 * Manipulator conditions.
 *
 * Injectors append to `manipulator.conditions` and never replace entries.
 * The engine reads the list as a conjunction, but order is kept as written:
 * device restriction first (added at compile time), then injectors in call order.
 */

import type { Condition, DeviceCondition, DeviceIds, Manipulator } from "./types.js";

export const LAYER_ON = 1;
export const LAYER_OFF = 0;

function appendCondition(manipulator: Manipulator, condition: Condition): void {
  if (!manipulator.conditions) manipulator.conditions = [];
  manipulator.conditions.push(condition);
}

/** Device restriction for a vendor/product pair, or undefined when either id is missing. */
export function deviceCondition(device?: DeviceIds): DeviceCondition | undefined {
  if (!device?.vendorId || !device.productId) return undefined;
  return {
    type: "device_if",
    identifiers: [{ vendor_id: device.vendorId, product_id: device.productId }],
  };
}

/**
 * Restrict a manipulator to frontmost applications matching the bundle id pattern(s).
 * No-op when no pattern is given.
 */
export function addAppRestriction(
  manipulator: Manipulator,
  patterns: string | readonly string[] | undefined,
): Manipulator {
  const list = (typeof patterns === "string" ? [patterns] : [...(patterns ?? [])]).filter(
    (p) => p.length > 0,
  );
  if (list.length === 0) return manipulator;

  appendCondition(manipulator, {
    type: "frontmost_application_if",
    bundle_identifiers: list,
  });
  return manipulator;
}

/** Require a layer variable to hold `value` (default 1) for the manipulator to match. */
export function addLayerCondition(
  manipulator: Manipulator,
  name: string,
  value: number = LAYER_ON,
): Manipulator {
  if (!name) throw new Error("layer condition needs a variable name");
  appendCondition(manipulator, { type: "variable_if", name, value });
  return manipulator;
}
