import { BoxError } from "./errors.js";
import type { ErrorSink, WarnSink } from "./diagnostics.js";
import { MOD_SHIFT } from "./events.js";

/** Per-surface tuning. Every field is optional. */
export type SurfaceConfig = Readonly<{
  /** Pointer travel (screen units) before a press becomes a drag. Default 4. */
  dragThreshold?: number;
  /** Press on empty space starts a rubber-band selection. Default true. */
  rubberBand?: boolean;
  /** Modifier mask that keeps the previous selection. Default MOD_SHIFT. */
  additiveModifier?: number;
  /** Tab / Shift+Tab move focus when no box consumes the key. Default true. */
  tabNavigation?: boolean;
  /** Enables once-per-key developer warnings. Default false. */
  devMode?: boolean;
  warn?: WarnSink;
  onError?: ErrorSink;
}>;

export type ResolvedSurfaceConfig = Readonly<{
  dragThreshold: number;
  rubberBand: boolean;
  additiveModifier: number;
  tabNavigation: boolean;
  devMode: boolean;
  warn: WarnSink;
  onError: ErrorSink;
}>;

const noop = (): void => {};

export const DEFAULT_SURFACE_CONFIG: ResolvedSurfaceConfig = Object.freeze({
  dragThreshold: 4,
  rubberBand: true,
  additiveModifier: MOD_SHIFT,
  tabNavigation: true,
  devMode: false,
  warn: noop,
  onError: noop,
});

function invalidConfig(detail: string): never {
  throw new BoxError("BOX_INVALID_CONFIG", detail);
}

function requireNonNegativeInt(name: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    invalidConfig(`${name} must be a non-negative integer`);
  }
  return v;
}

function requireBoolean(name: string, v: unknown): boolean {
  if (typeof v !== "boolean") invalidConfig(`${name} must be a boolean`);
  return v;
}

function requireFunction<T extends (...args: never[]) => void>(name: string, v: T): T {
  if (typeof v !== "function") invalidConfig(`${name} must be a function`);
  return v;
}

export function resolveSurfaceConfig(config: SurfaceConfig | undefined): ResolvedSurfaceConfig {
  if (!config) return DEFAULT_SURFACE_CONFIG;
  const d = DEFAULT_SURFACE_CONFIG;
  return Object.freeze({
    dragThreshold:
      config.dragThreshold === undefined
        ? d.dragThreshold
        : requireNonNegativeInt("dragThreshold", config.dragThreshold),
    rubberBand:
      config.rubberBand === undefined ? d.rubberBand : requireBoolean("rubberBand", config.rubberBand),
    additiveModifier:
      config.additiveModifier === undefined
        ? d.additiveModifier
        : requireNonNegativeInt("additiveModifier", config.additiveModifier),
    tabNavigation:
      config.tabNavigation === undefined
        ? d.tabNavigation
        : requireBoolean("tabNavigation", config.tabNavigation),
    devMode: config.devMode === undefined ? d.devMode : requireBoolean("devMode", config.devMode),
    warn: config.warn === undefined ? d.warn : requireFunction("warn", config.warn),
    onError: config.onError === undefined ? d.onError : requireFunction("onError", config.onError),
  });
}
