/**
 * packages/core/src/widgets/window.ts — Movable window with a title bar.
 *
 * Structure (a column group stretching its title bar):
 *
 *   window (focusable, raise-on-focus, swallows presses)
 *   ├── title bar (drags the window, shows the title)
 *   ├── body (column group with padding)
 *   └── close button (anchored to the top-right corner, outside the flow)
 */

import { Box, type PositionalAnchorInput } from "../runtime/box.js";
import { makeButton } from "./button.js";
import { makeColumn } from "./containers.js";

export type WindowOptions = Readonly<{
  id?: string;
  title?: string;
  x?: number;
  y?: number;
  /** Fixed body width; default sizes to content. */
  width?: number;
  /** Fixed body height; default sizes to content. */
  height?: number;
  titleBarHeight?: number;
  padding?: number;
  spacing?: number;
  closable?: boolean;
  draggable?: boolean;
  /** Keep the window inside this box while dragging. */
  bounds?: Box | null;
  fill?: string;
  titleBarFill?: string;
  anchor?: PositionalAnchorInput;
  children?: readonly Box[];
  onClose?: (win: WindowHandle) => void;
}>;

export type WindowHandle = Readonly<{
  box: Box;
  titleBar: Box;
  body: Box;
  closeButton: Box | null;
  /** Destroy the window and call `onClose`. Later calls do nothing. */
  close: () => void;
  isClosed: () => boolean;
}>;

export const DEFAULT_TITLE_BAR_HEIGHT = 24;
export const DEFAULT_WINDOW_PADDING = 8;
const CLOSE_INSET = 2;

export function makeWindow(opts: WindowOptions = {}): WindowHandle {
  const barH = opts.titleBarHeight ?? DEFAULT_TITLE_BAR_HEIGHT;
  let closed = false;

  const box = new Box({
    id: opts.id,
    x: opts.x,
    y: opts.y,
    fill: opts.fill ?? "window",
    focusable: true,
    raiseOnFocus: true,
    anchor: opts.anchor,
    layout: { kind: "column", crossAlign: "stretch" },
    // Presses inside a window never fall through to what is behind it.
    onPress: () => true,
  });

  const titleBar = new Box({
    id: `${box.id}.titleBar`,
    w: barH * 2,
    h: barH,
    fill: opts.titleBarFill ?? "titleBar",
    label: opts.title,
    drag: opts.draggable === false ? false : { moveTarget: "parent", bounds: opts.bounds ?? null },
  });

  const body = makeColumn({
    id: `${box.id}.body`,
    padding: opts.padding ?? DEFAULT_WINDOW_PADDING,
    spacing: opts.spacing ?? 0,
    width: opts.width,
    height: opts.height,
    children: opts.children,
  });

  box.addChild(titleBar).addChild(body);

  const close = (): void => {
    if (closed) return;
    closed = true;
    box.destroy();
    opts.onClose?.(handle);
  };

  let closeButton: Box | null = null;
  if (opts.closable !== false) {
    const size = Math.max(0, barH - CLOSE_INSET * 2);
    closeButton = makeButton({
      id: `${box.id}.close`,
      label: "x",
      w: size,
      h: size,
      zIndex: 1,
      anchor: {
        self: "top-right",
        target: "top-right",
        offset: { x: -CLOSE_INSET, y: CLOSE_INSET },
      },
      onPress: close,
    });
    box.addChild(closeButton);
  }

  const handle: WindowHandle = Object.freeze({
    box,
    titleBar,
    body,
    closeButton,
    close,
    isClosed: () => closed,
  });

  return handle;
}
