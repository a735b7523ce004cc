/**
 * Identifier classification.
 *
 * Karabiner splits inputs into two namespaces: mouse buttons ("button1",
 * "button2", ...) live under `pointing_button`, everything else under
 * `key_code`. The prefix is the only signal used.
 */

import type { InputIdentifier } from "./types.js";

const POINTING_BUTTON_PREFIX = "button";

export function isPointingButton(symbol: string): boolean {
  return symbol.startsWith(POINTING_BUTTON_PREFIX);
}

/** Wrap a symbol in the namespace the engine expects for it. */
export function classifyIdentifier(symbol: string): InputIdentifier {
  return isPointingButton(symbol)
    ? { pointing_button: symbol }
    : { key_code: symbol };
}
