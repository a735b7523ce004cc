/**
 * list_usb_devices MCP tool — discover vendor/product ids of connected devices.
 */

import {
  formatDeviceTable,
  runSystemProfiler,
  scanUsbDevices,
  type ProfilerRunner,
} from "../devices/usb-scanner.js";

export interface ListUsbDevicesInput {
  /** Case-insensitive substring matched against name and manufacturer. */
  filter?: string;
}

/**
 * Execute the list_usb_devices tool.
 *
 * @returns Human-readable device table.
 */
export async function executeListUsbDevices(
  input: ListUsbDevicesInput,
  run: ProfilerRunner = runSystemProfiler,
): Promise<string> {
  const devices = await scanUsbDevices(run);
  const needle = input.filter?.trim().toLowerCase();
  const matched = needle
    ? devices.filter(
        (d) => d.name.toLowerCase().includes(needle) || d.manufacturer.toLowerCase().includes(needle),
      )
    : devices;

  if (matched.length === 0) {
    return needle ? `No USB devices matching "${input.filter}".` : "No USB devices found.";
  }

  return [
    `Found ${matched.length} device(s).`,
    "",
    formatDeviceTable(matched),
    "",
    "Pass the decimal ids as vendorId/productId to compile_button or build_profile.",
  ].join("\n");
}
