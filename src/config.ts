/**
 * Configuration from environment variables
 * Explicit session options always win over these defaults
 */

import { isLogLevel, type LogLevel } from "./log";

type Env = Record<string, string | undefined>;

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function getEnvLogLevel(env: Env, key: string, defaultValue: LogLevel): LogLevel {
  const value = env[key]?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : defaultValue;
}

export interface PrinterConfig {
  SERIAL_PORT: string;
  BAUD_RATE: number;
  PREFERRED_PORT: string;
  AUTO_DISCOVER: boolean;
  TIMEOUT_MS: number;
  LOG_LEVEL: LogLevel;
}

export function loadConfig(env: Env = process.env): PrinterConfig {
  return {
    /**
     * Serial port of the printer (auto-discover if empty)
     * @env PRINTER_PORT
     * @default ""
     */
    SERIAL_PORT: getEnvString(env, "PRINTER_PORT", ""),

    /**
     * Serial baud rate, must match the printer
     * @env PRINTER_BAUD_RATE
     * @default 9600
     */
    BAUD_RATE: getEnvNumber(env, "PRINTER_BAUD_RATE", 9600),

    /**
     * Port picked first when discovery finds several printers
     * @env PRINTER_PREFERRED_PORT
     * @default "COM8"
     */
    PREFERRED_PORT: getEnvString(env, "PRINTER_PREFERRED_PORT", "COM8"),

    /**
     * Look for a Bluetooth printer when no port is given
     * @env PRINTER_AUTO_DISCOVER
     * @default true
     */
    AUTO_DISCOVER: getEnvBoolean(env, "PRINTER_AUTO_DISCOVER", true),

    /**
     * Open and write timeout in milliseconds
     * @env PRINTER_TIMEOUT
     * @default 3000
     */
    TIMEOUT_MS: getEnvNumber(env, "PRINTER_TIMEOUT", 3000),

    /**
     * Log level: debug, info, warn, error
     * @env PRINTER_LOG_LEVEL
     * @default "info"
     */
    LOG_LEVEL: getEnvLogLevel(env, "PRINTER_LOG_LEVEL", "info"),
  };
}

export const config = loadConfig();
