/**
 * build_profile MCP tool — compile rule groups into a Karabiner profile
 * and optionally write it where Karabiner picks up complex modifications.
 */

import { resolve, dirname, isAbsolute } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import {
  buildProfile,
  countManipulators,
  serializeProfile,
  type ProfileJson,
  type RuleGroupSpec,
} from "../profile/builder.js";

export interface BuildProfileInput {
  title: string;
  vendorId?: number;
  productId?: number;
  rules: RuleGroupSpec[];
  outputPath?: string;
}

export interface BuildProfileResult {
  content: string;
  profile: ProfileJson;
  writtenTo?: string;
}

/**
 * Execute profile generation, writing the file when outputPath is given.
 */
export async function executeBuildProfile(input: BuildProfileInput): Promise<BuildProfileResult> {
  if (input.outputPath) {
    if (!input.outputPath.endsWith(".json")) {
      throw new Error("outputPath must end with .json");
    }
    if (!isAbsolute(input.outputPath)) {
      throw new Error(`outputPath must be an absolute path, got "${input.outputPath}"`);
    }
    if (input.outputPath.includes("..")) {
      throw new Error("outputPath must not contain path traversal (..)");
    }
  }

  const profile = buildProfile({
    title: input.title,
    device: { vendorId: input.vendorId, productId: input.productId },
    rules: input.rules,
  });
  const content = serializeProfile(profile);

  let writtenTo: string | undefined;
  if (input.outputPath) {
    const resolved = resolve(input.outputPath);
    await mkdir(dirname(resolved), { recursive: true });
    await writeFile(resolved, content + "\n", "utf-8");
    writtenTo = resolved;
  }

  return { content, profile, writtenTo };
}

/**
 * Format the result as text for MCP response.
 */
export function formatProfileResult(result: BuildProfileResult): string {
  const lines: string[] = [];

  if (result.writtenTo) {
    lines.push(`FILE WRITTEN SUCCESSFULLY to: ${result.writtenTo}`);
    lines.push("");
  }

  const { profile } = result;
  lines.push(
    `Generated profile "${profile.title}": ${profile.rules.length} rule group(s), ` +
      `${countManipulators(profile)} manipulator(s).`,
  );
  lines.push("");

  for (const rule of profile.rules) {
    lines.push(`  - ${rule.description} (${rule.manipulators.length} manipulators)`);
  }
  lines.push("");

  lines.push("```json");
  lines.push(result.content);
  lines.push("```");

  return lines.join("\n");
}
