/**
 * USB device discovery (macOS).
 *
 * Reads the tree printed by `system_profiler SPUSBDataType -json` and
 * flattens it into vendor/product id pairs usable as device_if conditions.
 * Hubs nest their children under `_items`.
 */

import { execFile } from "node:child_process";

export interface UsbDevice {
  name: string;
  vendorId: number;
  productId: number;
  manufacturer: string;
}

/** Runs system_profiler and resolves with its stdout. */
export type ProfilerRunner = () => Promise<string>;

const HEX_ID = /0x[0-9a-fA-F]+/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** "0x1532  (Razer USA Ltd.)" → 0x1532. */
function parseHexId(raw: unknown): number | undefined {
  if (typeof raw !== "string") return undefined;
  const match = HEX_ID.exec(raw);
  return match ? parseInt(match[0], 16) : undefined;
}

function collect(node: Record<string, unknown>, out: UsbDevice[]): void {
  if (node.vendor_id !== undefined && node.product_id !== undefined) {
    const vendorId = parseHexId(node.vendor_id);
    const productId = parseHexId(node.product_id);
    if (vendorId !== undefined && productId !== undefined) {
      out.push({
        name: typeof node._name === "string" ? node._name : "Unknown Device",
        vendorId,
        productId,
        manufacturer: typeof node.manufacturer === "string" ? node.manufacturer : "Unknown",
      });
    }
  }

  if (Array.isArray(node._items)) {
    for (const child of node._items) {
      if (isRecord(child)) collect(child, out);
    }
  }
}

/**
 * Parse system_profiler JSON output into a flat device list (tree order).
 * Throws if the text is not JSON.
 */
export function parseUsbTree(json: string): UsbDevice[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    throw new Error("Could not parse system_profiler output as JSON");
  }

  const roots = isRecord(data) ? data.SPUSBDataType : undefined;
  const devices: UsbDevice[] = [];
  if (!Array.isArray(roots)) return devices;

  for (const root of roots) {
    if (isRecord(root)) collect(root, devices);
  }
  return devices;
}

/** Default runner: spawns the real system_profiler. */
export const runSystemProfiler: ProfilerRunner = () =>
  new Promise<string>((resolve, reject) => {
    execFile(
      "system_profiler",
      ["SPUSBDataType", "-json"],
      { encoding: "utf8", maxBuffer: 16 * 1024 * 1024 },
      (err, stdout) => {
        if (err) reject(new Error(`system_profiler failed: ${err.message}`));
        else resolve(stdout);
      },
    );
  });

/** Scan connected USB devices. */
export async function scanUsbDevices(
  run: ProfilerRunner = runSystemProfiler,
): Promise<UsbDevice[]> {
  return parseUsbTree(await run());
}

function hex(n: number): string {
  return `0x${n.toString(16).padStart(4, "0")}`;
}

/** Aligned text table: name, vendor id, product id (hex) and decimal ids for device_if. */
export function formatDeviceTable(devices: UsbDevice[]): string {
  const nameWidth = Math.max(11, ...devices.map((d) => d.name.length));
  const header = `${"DEVICE NAME".padEnd(nameWidth)} | ${"VENDOR".padEnd(6)} | ${"PRODUCT".padEnd(7)} | DECIMAL`;
  const lines = [header, "-".repeat(header.length)];
  for (const d of devices) {
    lines.push(
      `${d.name.padEnd(nameWidth)} | ${hex(d.vendorId).padEnd(6)} | ${hex(d.productId).padEnd(7)} | ${d.vendorId}/${d.productId}`,
    );
  }
  return lines.join("\n");
}
