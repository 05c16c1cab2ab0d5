/**
 * packages/core/src/diagnostics.ts — Warning and error sinks.
 *
 * Why: The runtime never writes to the console itself. Hosts inject `warn` and
 * `onError`; everything the runtime reports (dropped drag presses, handler
 * throws, layout oddities) goes through them with a `[boxweave][<area>]` prefix.
 */

import { BoxError, describeThrown } from "./errors.js";

export type DiagnosticArea = "drag" | "focus" | "layout" | "dispatch";

export type WarnSink = (message: string) => void;
export type ErrorSink = (error: BoxError) => void;

export type Diagnostics = Readonly<{
  /** Always forwarded. */
  warn: (area: DiagnosticArea, detail: string) => void;
  /** devMode only, once per key. */
  devWarn: (area: DiagnosticArea, key: string, detail: string) => void;
  error: (error: BoxError) => void;
  /**
   * Run user code. A throw is reported as BOX_USER_CODE_THROW and `undefined`
   * is returned in place of the callback's result.
   */
  guard: <T>(label: string, fn: () => T) => T | undefined;
}>;

export type DiagnosticsOptions = Readonly<{
  devMode: boolean;
  warn: WarnSink;
  onError: ErrorSink;
}>;

export function formatDiagnostic(area: DiagnosticArea, detail: string): string {
  return `[boxweave][${area}] ${detail}`;
}

export function createDiagnostics(opts: DiagnosticsOptions): Diagnostics {
  const warned = new Set<string>();

  const error = (err: BoxError): void => {
    try {
      opts.onError(err);
    } catch (sinkErr: unknown) {
      opts.warn(formatDiagnostic("dispatch", `onError sink threw: ${describeThrown(sinkErr)}`));
    }
  };

  return Object.freeze({
    warn: (area: DiagnosticArea, detail: string) => {
      opts.warn(formatDiagnostic(area, detail));
    },
    devWarn: (area: DiagnosticArea, key: string, detail: string) => {
      if (!opts.devMode) return;
      if (warned.has(key)) return;
      warned.add(key);
      opts.warn(formatDiagnostic(area, detail));
    },
    error,
    guard: <T>(label: string, fn: () => T): T | undefined => {
      try {
        return fn();
      } catch (e: unknown) {
        error(new BoxError("BOX_USER_CODE_THROW", `${label} threw: ${describeThrown(e)}`));
        return undefined;
      }
    },
  });
}
