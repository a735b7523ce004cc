/**
 * Zod schemas for build_profile tool parameters.
 */

import { z } from "zod";
import { buttonSchema, deviceIdsSchema, scopeSchema } from "./button.js";

const profileEntrySchema = z.object({
  button: buttonSchema,
  ...scopeSchema,
});

export const buildProfileSchema = {
  title: z.string().min(1).describe('Profile title shown in Karabiner, e.g. "Naga Profile".'),
  ...deviceIdsSchema,
  rules: z
    .array(
      z.object({
        description: z.string().min(1).describe("Rule group description."),
        entries: z
          .array(profileEntrySchema)
          .min(1)
          .describe(
            "Buttons in evaluation order. Karabiner applies the first match, " +
              "so list layer and app scoped entries before global defaults.",
          ),
      }),
    )
    .min(1)
    .describe("Rule groups, each becoming one Karabiner rule."),
  outputPath: z
    .string()
    .optional()
    .describe(
      "Optional ABSOLUTE file path (.json) to write the profile, e.g. " +
        "/Users/me/.config/karabiner/assets/complex_modifications/naga.json (no ~ expansion). " +
        "The JSON is always returned in the response regardless.",
    ),
};
