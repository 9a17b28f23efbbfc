/**
 * Printer helpers
 * Human-readable listing of discovered printers and a test print
 */

import { config as defaultConfig, type PrinterConfig } from "./config";
import { createDiscovery, type DiscoveredPort, type PrinterDiscovery } from "./discovery";
import { createConsoleLog, type LogFn } from "./log";
import { withPrinter, type PrinterSessionOptions } from "./serial/session";

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * Local time as YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export async function listAvailablePrinters(
  options: { discovery?: PrinterDiscovery; log?: LogFn } = {},
  defaults: PrinterConfig = defaultConfig
): Promise<DiscoveredPort[]> {
  const log = options.log ?? createConsoleLog(defaults.LOG_LEVEL);
  const discovery = options.discovery ?? createDiscovery();

  log("info", "=== Available Bluetooth Printers ===");
  const printers = await discovery.findPrinters();

  if (printers.length === 0) {
    log("warn", "No Bluetooth printers found.");
    log("info", "Troubleshooting:");
    log("info", "1. Make sure your printer is powered on");
    log("info", "2. Pair the printer in the system Bluetooth settings");
    log("info", "3. Ensure the printer is connected (not just paired)");
    return [];
  }

  printers.forEach((printer, i) => {
    log("info", `${i + 1}. Port: ${printer.port}`);
    log("info", `   Description: ${printer.description}`);
    if (printer.bluetoothAddress) {
      log("info", `   Bluetooth Address: ${printer.bluetoothAddress}`);
    }
    log("info", "");
  });

  return printers;
}

/**
 * List printers, then print a timestamped test page on the resolved one
 * @returns true when every line reached the printer
 */
export async function testConnection(
  options: PrinterSessionOptions = {},
  now: () => Date = () => new Date(),
  defaults: PrinterConfig = defaultConfig
): Promise<boolean> {
  const log = options.log ?? createConsoleLog(defaults.LOG_LEVEL);
  const discovery = options.discovery ?? createDiscovery();
  const sessionOptions = { ...options, log, discovery };

  log("info", "=== Printer Connection Test ===");
  await listAvailablePrinters({ discovery, log }, defaults);

  return withPrinter(
    sessionOptions,
    async (printer) => {
      if (!printer.isConnected()) {
        log("error", "Failed to connect to printer");
        return false;
      }

      const lines = [
        "=== Connection Test ===",
        `Timestamp: ${formatTimestamp(now())}`,
        "Printer: Bluetooth thermal",
        "Status: Connected successfully!",
      ];

      let ok = true;
      for (const line of lines) {
        ok = (await printer.writeLine(line)) && ok;
      }
      ok = (await printer.feed(3)) && ok;

      if (ok) {
        log("info", "Test print sent successfully");
      } else {
        log("error", "Test print incomplete");
      }
      return ok;
    },
    defaults
  );
}
