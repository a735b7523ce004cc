import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { formatDeviceTable, parseUsbTree, scanUsbDevices } from "../../src/devices/usb-scanner.js";

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "fixtures");

async function fixture(): Promise<string> {
  return readFile(path.join(FIXTURES, "usb-tree.json"), "utf-8");
}

describe("parseUsbTree", () => {
  it("flattens nested hubs in tree order", async () => {
    const devices = parseUsbTree(await fixture());
    expect(devices).toEqual([
      { name: "USB2.0 Hub", vendorId: 0x05e3, productId: 0x0610, manufacturer: "GenesysLogic" },
      { name: "Test Gaming Mouse", vendorId: 1678, productId: 181, manufacturer: "Test Peripherals" },
      { name: "Test Keypad", vendorId: 0x1234, productId: 0xabcd, manufacturer: "Unknown" },
    ]);
  });

  it("skips nodes whose ids carry no hex literal", async () => {
    const devices = parseUsbTree(await fixture());
    expect(devices.map((d) => d.name)).not.toContain("Mystery Device");
  });

  it("returns an empty list when the data type is missing", () => {
    expect(parseUsbTree("{}")).toEqual([]);
  });

  it("defaults the device name", () => {
    const json = JSON.stringify({ SPUSBDataType: [{ vendor_id: "0x0001", product_id: "0x0002" }] });
    expect(parseUsbTree(json)[0].name).toBe("Unknown Device");
  });

  it("throws on non-JSON output", () => {
    expect(() => parseUsbTree("not json")).toThrow("Could not parse system_profiler output as JSON");
  });
});

describe("scanUsbDevices", () => {
  it("parses what the runner returns", async () => {
    const json = await fixture();
    const devices = await scanUsbDevices(async () => json);
    expect(devices).toHaveLength(3);
  });

  it("propagates runner failures", async () => {
    await expect(
      scanUsbDevices(async () => {
        throw new Error("system_profiler failed: not found");
      }),
    ).rejects.toThrow("system_profiler failed: not found");
  });
});

describe("formatDeviceTable", () => {
  it("prints hex and decimal ids", () => {
    const table = formatDeviceTable([
      { name: "Mouse", vendorId: 1678, productId: 181, manufacturer: "X" },
    ]);
    expect(table.split("\n")).toEqual([
      "DEVICE NAME | VENDOR | PRODUCT | DECIMAL",
      "-".repeat(40),
      "Mouse       | 0x068e | 0x00b5  | 1678/181",
    ]);
  });
});
