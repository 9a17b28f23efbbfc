/**
 * Bluetooth serial receipt printer
 * Discovery of Bluetooth-backed serial ports and plain-text printing
 */

export * from "./discovery";
export * from "./serial/errors";
export * from "./serial/port";
export * from "./serial/session";
export { withTimeout } from "./serial/timeout";
export { config, loadConfig, type PrinterConfig } from "./config";
export { createConsoleLog, type LogFn, type LogLevel } from "./log";
export { listAvailablePrinters, testConnection, formatTimestamp } from "./printers";
