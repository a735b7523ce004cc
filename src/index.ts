#!/usr/bin/env node

/**
 * karabiner-rules-mcp-server — MCP entry point.
 *
 * Registers tools and starts the stdio transport.
 * stdout carries the protocol; diagnostics go to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { executeCompileButton, formatCompileResult } from "./tools/compile.js";
import { compileButtonSchema } from "./schemas/compile.js";
import { executeBuildProfile, formatProfileResult } from "./tools/profile.js";
import { buildProfileSchema } from "./schemas/profile.js";
import { executeListUsbDevices } from "./tools/devices.js";
import { listUsbDevicesSchema } from "./schemas/devices.js";

const server = new McpServer({
  name: "karabiner-rules-mcp-server",
  version: "0.1.0",
});

// ---------------------------------------------------------------------------
// Tool: compile_button
// ---------------------------------------------------------------------------

server.tool(
  "compile_button",
  "Compile one button blueprint into a Karabiner-Elements manipulator. " +
    "Behaviors: click (tap runs an action), modifier (hold sets a layer variable), " +
    "dual (tap action + hold layer), virtual (key becomes a layer modifier), " +
    "simultaneous (chord of several buttons). " +
    "Optionally restrict to a device (vendorId + productId), an application (app) or an active layer. " +
    "The manipulator JSON is ALWAYS returned in the response.",
  compileButtonSchema,
  async (input) => {
    try {
      const result = executeCompileButton(input);
      return { content: [{ type: "text", text: formatCompileResult(input, result) }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error compiling button: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: build_profile
// ---------------------------------------------------------------------------

server.tool(
  "build_profile",
  "Compile ordered rule groups into a Karabiner-Elements complex modification profile " +
    '({ "title", "rules": [{ "description", "manipulators" }] }). ' +
    "Karabiner applies the first matching manipulator, so list layer and app scoped entries " +
    "before global defaults for the same button. " +
    "If outputPath is provided, the file is written to disk by the server. " +
    "The complete JSON is ALWAYS returned in the response — present it directly to the user.",
  buildProfileSchema,
  async ({ title, vendorId, productId, rules, outputPath }) => {
    try {
      const result = await executeBuildProfile({ title, vendorId, productId, rules, outputPath });
      return { content: [{ type: "text", text: formatProfileResult(result) }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error building profile: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: list_usb_devices
// ---------------------------------------------------------------------------

server.tool(
  "list_usb_devices",
  "List connected USB devices with their vendor and product ids (macOS, via system_profiler). " +
    "Use the ids to restrict compiled rules to one mouse or keypad.",
  listUsbDevicesSchema,
  async ({ filter }) => {
    try {
      const result = await executeListUsbDevices({ filter });
      return { content: [{ type: "text", text: result }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error listing USB devices: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("karabiner-rules-mcp-server running on stdio");
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
