/**
 * packages/core/src/widgets/button.ts — Focusable push button.
 *
 * A click, or Enter/Space while focused, fires `onPress`. The press itself is
 * consumed so the button takes focus on click.
 */

import type { KeyEvent } from "../events.js";
import type { PositionalAnchorInput } from "../runtime/box.js";
import { Box } from "../runtime/box.js";

export const DEFAULT_BUTTON_HEIGHT = 24;
const LABEL_CHAR_WIDTH = 8;
const LABEL_PADDING = 16;

export type ButtonOptions = Readonly<{
  id?: string;
  label: string;
  x?: number;
  y?: number;
  /** Default: label width plus padding. */
  w?: number;
  h?: number;
  zIndex?: number;
  fill?: string;
  texture?: string;
  disabled?: boolean;
  anchor?: PositionalAnchorInput;
  onPress?: (button: Box) => void;
}>;

export function isActivationKey(event: KeyEvent): boolean {
  return event.kind === "keyDown" && (event.key === "Enter" || event.key === " " || event.key === "Space");
}

export function makeButton(opts: ButtonOptions): Box {
  const fire = (button: Box): boolean => {
    opts.onPress?.(button);
    return true;
  };
  return new Box({
    id: opts.id,
    x: opts.x,
    y: opts.y,
    w: opts.w ?? opts.label.length * LABEL_CHAR_WIDTH + LABEL_PADDING,
    h: opts.h ?? DEFAULT_BUTTON_HEIGHT,
    zIndex: opts.zIndex,
    label: opts.label,
    fill: opts.fill ?? "button",
    texture: opts.texture,
    inputEnabled: opts.disabled !== true,
    focusable: true,
    anchor: opts.anchor,
    onPress: () => true,
    onClick: fire,
    onKey: (button, event) => (isActivationKey(event) ? fire(button) : false),
  });
}
