/**
 * Printer errors
 * Expected failures are returned as results; these helpers classify them
 */

export type PrinterErrorKind =
  | "no_port"
  | "not_connected"
  | "port_not_found"
  | "port_busy"
  | "access_denied"
  | "timeout"
  | "io_error";

export interface PrinterFailure {
  ok: false;
  kind: PrinterErrorKind;
  message: string;
}

export type ConnectResult = { ok: true; port: string } | PrinterFailure;
export type WriteResult = { ok: true; bytesWritten: number } | PrinterFailure;

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classify a serial error by its message.
 * Linux:   "Error: No such file or directory, cannot open /dev/rfcomm0"
 *          "Error Resource temporarily unavailable Cannot lock port"
 * Windows: "Opening COM9: File not found", "Opening COM8: Access denied"
 */
export function classifyError(err: unknown): PrinterErrorKind {
  if (err instanceof TimeoutError) return "timeout";

  const message = errorMessage(err);
  if (/no such file|not found|does not exist|ENOENT/i.test(message)) {
    return "port_not_found";
  }
  if (/cannot lock|resource busy|temporarily unavailable|EBUSY/i.test(message)) {
    return "port_busy";
  }
  if (/access denied|permission denied|EACCES|EPERM/i.test(message)) {
    return "access_denied";
  }
  return "io_error";
}

export function toFailure(err: unknown): PrinterFailure {
  return { ok: false, kind: classifyError(err), message: errorMessage(err) };
}

export const TROUBLESHOOTING_CHECKLIST = [
  "Powered on",
  "Bluetooth paired and connected",
  "Not being used by another application",
];

/**
 * Hint for a failed connect, most specific first
 */
export function troubleshootingHint(
  kind: PrinterErrorKind,
  port: string
): string | null {
  switch (kind) {
    case "port_not_found":
      return `${port} does not exist. Pair the printer in the system Bluetooth settings and check the port name`;
    case "port_busy":
      return `${port} is busy. Close any other application using it`;
    case "access_denied":
      // On Windows a port held by another program also reports Access denied
      return `No access to ${port}. Close other applications using it, or add user to dialout group: sudo usermod -aG dialout $USER`;
    case "timeout":
      return "The printer did not answer in time. Make sure it is in range";
    default:
      return null;
  }
}
