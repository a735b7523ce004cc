/**
 * compile_button MCP tool — compile one button blueprint into a manipulator.
 */

import { buttonLabel } from "../rules/button.js";
import { compileScopedRule } from "../rules/compilers.js";
import type { ButtonConfigInput, Manipulator } from "../rules/types.js";

export interface CompileButtonInput {
  button: ButtonConfigInput;
  vendorId?: number;
  productId?: number;
  app?: string | string[];
  layer?: string;
  layerValue?: number;
}

export interface CompileButtonResult {
  manipulator: Manipulator;
  content: string;
}

/**
 * Execute the compile_button tool.
 * Throws when the blueprint is invalid.
 */
export function executeCompileButton(input: CompileButtonInput): CompileButtonResult {
  const manipulator = compileScopedRule(input.button, {
    device: { vendorId: input.vendorId, productId: input.productId },
    app: input.app,
    layer: input.layer,
    layerValue: input.layerValue,
  });
  return { manipulator, content: JSON.stringify(manipulator, null, 2) };
}

/**
 * Format the result as text for MCP response.
 */
export function formatCompileResult(input: CompileButtonInput, result: CompileButtonResult): string {
  const conditions = result.manipulator.conditions?.length ?? 0;
  return [
    `Compiled ${input.button.behavior} rule for ${buttonLabel(input.button.buttonId)} ` +
      `(${conditions} condition${conditions === 1 ? "" : "s"}).`,
    "",
    "```json",
    result.content,
    "```",
  ].join("\n");
}
