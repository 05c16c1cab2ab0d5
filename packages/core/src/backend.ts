/**
 * Engine collaborator interface.
 *
 * The runtime draws nothing itself: an engine owns the frame clock, delivers
 * raw input in screen coordinates and paints rects/sprites at a z-order.
 * `attachEngine` (app/attachEngine.ts) is the only code that talks to it.
 */

import type { FrameInfo } from "./app/surface.js";
import type { InputEvent } from "./events.js";
import type { Rect, Size } from "./layout/types.js";

/** Stops a subscription. Idempotent. */
export type Unsubscribe = () => void;

export interface EngineBackend {
  screenSize(): Size;
  /** Called once per engine frame. */
  onFrame(cb: (frame: FrameInfo) => void): Unsubscribe;
  /** Called for every raw input event, in arrival order. */
  onInput(cb: (event: InputEvent) => void): Unsubscribe;
  /** Optional: screen size changes. */
  onResize?(cb: (size: Size) => void): Unsubscribe;
  drawRect(rect: Rect, z: number, fill: string): void;
  drawSprite(rect: Rect, z: number, texture: string): void;
  /** Engines without text support leave this out; labels are then skipped. */
  drawText?(rect: Rect, z: number, text: string): void;
}
