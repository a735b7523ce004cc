/**
 * Zod schemas for compile_button tool parameters.
 */

import { buttonSchema, deviceIdsSchema, scopeSchema } from "./button.js";

export const compileButtonSchema = {
  button: buttonSchema.describe("Button blueprint to compile."),
  ...deviceIdsSchema,
  ...scopeSchema,
};
