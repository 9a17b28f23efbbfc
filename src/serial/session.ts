/**
 * Printer Session
 * Owns a single serial connection to a Bluetooth receipt printer
 */

import { config as defaultConfig, type PrinterConfig } from "../config";
import { createDiscovery, selectPrinter } from "../discovery";
import type { PrinterDiscovery } from "../discovery";
import { createConsoleLog, type LogFn } from "../log";
import {
  TimeoutError,
  TROUBLESHOOTING_CHECKLIST,
  errorMessage,
  toFailure,
  troubleshootingHint,
  type ConnectResult,
  type PrinterFailure,
  type WriteResult,
} from "./errors";
import {
  openSerialPort,
  portSettings,
  type OpenPortFn,
  type PrinterPort,
} from "./port";
import { withTimeout } from "./timeout";

export interface PrinterSessionOptions {
  port?: string;                 // Auto-discover if not specified
  baudRate?: number;
  autoDiscover?: boolean;
  preferredPort?: string;        // Picked first among discovered ports
  timeoutMs?: number;            // Open and write timeout
  discovery?: PrinterDiscovery;
  openPort?: OpenPortFn;
  log?: LogFn;
}

export type PrinterPayload = string | Uint8Array;

/**
 * Strings are sent as UTF-8, bytes as they are
 */
export function encodePayload(payload: PrinterPayload): Buffer {
  if (typeof payload === "string") {
    return Buffer.from(payload, "utf8");
  }
  return Buffer.isBuffer(payload) ? payload : Buffer.from(payload);
}

/**
 * Printer Session
 *
 * Usage:
 * ```typescript
 * const printer = await PrinterSession.create();
 * await printer.use(async (p) => {
 *   if (p.isConnected()) {
 *     await p.writeLine("Hello");
 *     await p.feed(2);
 *   }
 * });
 * ```
 */
export class PrinterSession {
  private serial: PrinterPort | null = null;
  private connected = false;
  private closing = false;

  private constructor(
    private readonly port: string | null,
    private readonly baudRate: number,
    private readonly timeoutMs: number,
    private readonly openPort: OpenPortFn,
    private readonly log: LogFn
  ) {}

  /**
   * Resolve the target port and create a session.
   * Never fails for lack of a port; connect() reports that instead.
   */
  static async create(
    options: PrinterSessionOptions = {},
    defaults: PrinterConfig = defaultConfig
  ): Promise<PrinterSession> {
    const log = options.log ?? createConsoleLog(defaults.LOG_LEVEL);
    const explicitPort = options.port ?? (defaults.SERIAL_PORT || undefined);
    const autoDiscover = options.autoDiscover ?? defaults.AUTO_DISCOVER;

    let port: string | null = null;

    if (explicitPort) {
      // 1. Explicit port wins
      port = explicitPort;
    } else if (autoDiscover) {
      // 2. Discovery, preferring the well-known port
      const discovery = options.discovery ?? createDiscovery();
      const preferredPort = options.preferredPort ?? defaults.PREFERRED_PORT;
      const printer = selectPrinter(await discovery.findPrinters(), preferredPort);

      if (printer) {
        port = printer.port;
        const suffix = printer.port === preferredPort ? " (preferred)" : "";
        log("info", `Auto-discovered printer on ${printer.port}${suffix}`);
        if (printer.bluetoothAddress) {
          log("info", `Bluetooth address: ${printer.bluetoothAddress}`);
        }
      } else {
        log("warn", "No Bluetooth printers found. Please specify port manually.");
      }
    } else {
      log("warn", "Auto-discovery disabled and no port given. Please specify port manually.");
    }

    return new PrinterSession(
      port,
      options.baudRate ?? defaults.BAUD_RATE,
      options.timeoutMs ?? defaults.TIMEOUT_MS,
      options.openPort ?? openSerialPort,
      log
    );
  }

  /**
   * Open the connection and report the outcome without throwing
   */
  async open(): Promise<ConnectResult> {
    if (this.connected && this.serial && this.port) {
      return { ok: true, port: this.port };
    }

    if (!this.port) {
      this.log("warn", "No printer port specified. Use auto-discovery or provide port manually.");
      return {
        ok: false,
        kind: "no_port",
        message: "No printer port specified",
      };
    }

    const port = this.port;
    let opened: PrinterPort | null = null;
    const pending = this.openPort(portSettings(port, this.baudRate), {
      // Write failures also reject the write itself, which send() reports
      onError: (err) => this.log("debug", `Printer error: ${err.message}`),
      // Only the port this session currently holds may end the connection
      onClose: () => {
        if (opened && opened === this.serial) this.handlePortClosed();
      },
    });

    try {
      opened = await withTimeout(pending, this.timeoutMs, `Opening ${port}`);
      this.serial = opened;
      this.connected = true;
      this.log("info", `Connected to printer on ${port}`);
      return { ok: true, port };
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.releaseLateOpen(pending);
      }
      this.serial = null;
      this.connected = false;
      return this.reportConnectFailure(port, toFailure(err));
    }
  }

  /**
   * Connect to the printer
   * @returns true if connection successful
   */
  async connect(): Promise<boolean> {
    return (await this.open()).ok;
  }

  /**
   * Write bytes and wait for the driver to accept them
   */
  async send(payload: PrinterPayload): Promise<WriteResult> {
    const serial = this.serial;
    if (!this.connected || !serial) {
      this.log("warn", "Not connected to printer");
      return {
        ok: false,
        kind: "not_connected",
        message: "Not connected to printer",
      };
    }

    const data = encodePayload(payload);

    try {
      await withTimeout(
        serial.write(data).then(() => serial.drain()),
        this.timeoutMs,
        "Write"
      );
      this.log("info", `Sent ${data.length} bytes to printer`);
      return { ok: true, bytesWritten: data.length };
    } catch (err) {
      const failure = toFailure(err);
      this.log("error", `Print failed: ${failure.message}`);
      return failure;
    }
  }

  /**
   * Print text (string or bytes)
   * @returns true if print successful
   */
  async writeText(payload: PrinterPayload): Promise<boolean> {
    return (await this.send(payload)).ok;
  }

  /**
   * Print a line of text (empty string for a blank line)
   */
  async writeLine(text = ""): Promise<boolean> {
    return this.writeText(text + "\n");
  }

  /**
   * Feed blank lines, useful for separating printouts
   */
  async feed(lines = 3): Promise<boolean> {
    return this.writeText("\n".repeat(Math.max(0, lines)));
  }

  /**
   * Close the connection (no-op when not connected)
   */
  async disconnect(): Promise<void> {
    const serial = this.serial;
    this.serial = null;
    this.connected = false;

    if (!serial || !serial.isOpen) {
      return;
    }

    this.closing = true;
    try {
      await serial.close();
      this.log("info", "Disconnected from printer");
    } finally {
      this.closing = false;
    }
  }

  /**
   * Connect, run body, and always disconnect afterwards.
   * The connect result is not checked here; body should test isConnected().
   */
  async use<T>(body: (printer: PrinterSession) => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await body(this);
    } finally {
      await this.disconnect();
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  getPort(): string | null {
    return this.port;
  }

  getBaudRate(): number {
    return this.baudRate;
  }

  private reportConnectFailure(
    port: string,
    failure: PrinterFailure
  ): PrinterFailure {
    this.log("error", `Connection failed: ${failure.message}`);

    const hint = troubleshootingHint(failure.kind, port);
    if (hint) {
      this.log("warn", hint);
    }

    this.log("warn", "Make sure the printer is:");
    for (const item of TROUBLESHOOTING_CHECKLIST) {
      this.log("warn", `  - ${item}`);
    }
    return failure;
  }

  /**
   * A port that finishes opening after the timeout is closed again
   */
  private releaseLateOpen(pending: Promise<PrinterPort>): void {
    pending
      .then((late) => late.close())
      .catch((err: unknown) => {
        this.log("debug", `Late open of ${this.port} ended: ${errorMessage(err)}`);
      });
  }

  /**
   * OS closed the port underneath us (link dropped, device powered off)
   */
  private handlePortClosed(): void {
    if (this.closing || !this.connected) return;

    this.connected = false;
    this.serial = null;
    this.log("warn", "Printer connection closed");
  }
}

/**
 * Create a session, connect, run body and always disconnect
 */
export async function withPrinter<T>(
  options: PrinterSessionOptions,
  body: (printer: PrinterSession) => Promise<T>,
  defaults: PrinterConfig = defaultConfig
): Promise<T> {
  const printer = await PrinterSession.create(options, defaults);
  return printer.use(body);
}
