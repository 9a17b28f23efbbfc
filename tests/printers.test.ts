/**
 * Printer Helper Tests
 */

import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import { formatTimestamp, listAvailablePrinters, testConnection } from "../src/printers";
import { MockDiscovery, type SerialPortListing } from "../src/discovery";
import { loadConfig } from "../src/config";
import { FakeOpener, collectLog } from "./helpers/fake-port";

const defaults = loadConfig({});

const serialPorts: SerialPortListing[] = [
  { path: "COM5", description: "Standard Serial over Bluetooth link (COM5)" },
  {
    path: "COM8",
    description: "Standard Serial over Bluetooth link (COM8)",
    hardwareId: "BTHENUM\\{00001101-0000-1000-8000-00805F9B34FB}_LOCALMFG&0002\\7&2A6B5F1&0&6622FA2B78F1_C00000000",
  },
];

const fixedNow = () => new Date(2026, 0, 2, 3, 4, 5);

describe("formatTimestamp", () => {
  it("formats local time as YYYY-MM-DD HH:MM:SS", () => {
    assert.strictEqual(formatTimestamp(new Date(2026, 10, 19, 14, 30, 9)), "2026-11-19 14:30:09");
  });
});

describe("listAvailablePrinters", () => {
  it("lists each printer with its details", async () => {
    const output = collectLog();
    const printers = await listAvailablePrinters(
      { discovery: new MockDiscovery({ serialPorts }), log: output.log },
      defaults
    );

    assert.strictEqual(printers.length, 2);
    assert.deepStrictEqual(output.messages(), [
      "=== Available Bluetooth Printers ===",
      "1. Port: COM5",
      "   Description: Standard Serial over Bluetooth link (COM5)",
      "",
      "2. Port: COM8",
      "   Description: Standard Serial over Bluetooth link (COM8)",
      "   Bluetooth Address: 66:22:FA:2B:78:F1",
      "",
    ]);
  });

  it("prints troubleshooting when nothing is found", async () => {
    const output = collectLog();
    const printers = await listAvailablePrinters(
      { discovery: new MockDiscovery(), log: output.log },
      defaults
    );

    assert.deepStrictEqual(printers, []);
    assert.deepStrictEqual(output.messages(), [
      "=== Available Bluetooth Printers ===",
      "No Bluetooth printers found.",
      "Troubleshooting:",
      "1. Make sure your printer is powered on",
      "2. Pair the printer in the system Bluetooth settings",
      "3. Ensure the printer is connected (not just paired)",
    ]);
  });
});

describe("testConnection", () => {
  let opener: FakeOpener;
  let output: ReturnType<typeof collectLog>;
  let discovery: MockDiscovery;

  beforeEach(() => {
    opener = new FakeOpener();
    output = collectLog();
    discovery = new MockDiscovery({ serialPorts });
  });

  it("prints a timestamped test page on the preferred printer", async () => {
    const ok = await testConnection(
      { discovery, openPort: opener.open, log: output.log },
      fixedNow,
      defaults
    );

    assert.strictEqual(ok, true);
    assert.strictEqual(opener.opened[0].path, "COM8");
    assert.strictEqual(
      opener.port.written().toString("utf8"),
      "=== Connection Test ===\n" +
        "Timestamp: 2026-01-02 03:04:05\n" +
        "Printer: Bluetooth thermal\n" +
        "Status: Connected successfully!\n" +
        "\n\n\n"
    );
    assert.strictEqual(opener.port.isOpen, false);

    const messages = output.messages();
    assert.strictEqual(messages[0], "=== Printer Connection Test ===");
    assert.deepStrictEqual(messages.slice(-2), [
      "Test print sent successfully",
      "Disconnected from printer",
    ]);
    assert.strictEqual(discovery.listCalls, 2);
  });

  it("returns false when the printer cannot be reached", async () => {
    opener.error = new Error("Opening COM8: File not found");

    const ok = await testConnection(
      { discovery, openPort: opener.open, log: output.log },
      fixedNow,
      defaults
    );

    assert.strictEqual(ok, false);
    assert.strictEqual(output.messages().at(-1), "Failed to connect to printer");
    assert.deepStrictEqual(opener.port.writes, []);
  });

  it("returns false when a line fails to print", async () => {
    opener.port.writeError = new Error("Writing to COM port: Unknown error code 121");

    const ok = await testConnection(
      { discovery, openPort: opener.open, log: output.log },
      fixedNow,
      defaults
    );

    assert.strictEqual(ok, false);
    assert.ok(output.messages().includes("Test print incomplete"));
    assert.strictEqual(opener.port.isOpen, false);
  });
});
