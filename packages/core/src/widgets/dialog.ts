/**
 * packages/core/src/widgets/dialog.ts — Dialog windows with action buttons.
 *
 * Why: A dialog is a window whose body holds an optional message and a row of
 * action buttons. Opened modally it confines input to itself and hands focus
 * back on close. Enter runs the default action (first "primary", else the
 * first action); Escape runs the "cancel" action, or just closes.
 */

import type { Surface } from "../app/surface.js";
import type { Box, PositionalAnchorInput } from "../runtime/box.js";
import { Box as BoxNode } from "../runtime/box.js";
import { makeButton } from "./button.js";
import { makeRow } from "./containers.js";
import { type WindowHandle, makeWindow } from "./window.js";

export type DialogActionIntent = "primary" | "default" | "cancel";

export type DialogAction = Readonly<{
  id?: string;
  label: string;
  intent?: DialogActionIntent;
  onPress?: (dialog: DialogHandle) => void;
  /** Close the dialog after `onPress`. Default true. */
  closes?: boolean;
}>;

export type DialogOptions = Readonly<{
  id?: string;
  title: string;
  message?: string;
  actions: readonly DialogAction[];
  /** Default true. */
  modal?: boolean;
  /** Default true. */
  closeOnEscape?: boolean;
  width?: number;
  /** Default: centered on the screen. */
  anchor?: PositionalAnchorInput;
  onClose?: (dialog: DialogHandle) => void;
}>;

export type DialogHandle = Readonly<{
  window: WindowHandle;
  buttons: readonly Box[];
  /** Attach to `surface`, push the modal layer and move focus inside. */
  open: (surface: Surface) => void;
  /** Pop the layer, restore focus and destroy the dialog. */
  close: () => void;
  isOpen: () => boolean;
  /** Run the default action. */
  confirm: () => void;
  /** Run the cancel action, or close when there is none. */
  cancel: () => void;
}>;

const MESSAGE_HEIGHT = 24;
const ACTION_SPACING = 8;
const MESSAGE_CHAR_WIDTH = 8;

export function makeDialog(opts: DialogOptions): DialogHandle {
  const modal = opts.modal !== false;
  const closeOnEscape = opts.closeOnEscape !== false;
  let surface: Surface | null = null;
  let open = false;

  const close = (): void => {
    if (!open) return;
    if (modal && surface !== null) surface.closeModal(win.box);
    win.close();
  };

  const run = (action: DialogAction): void => {
    action.onPress?.(handle);
    if (action.closes !== false) close();
  };

  const defaultAction = opts.actions.find((a) => a.intent === "primary") ?? opts.actions[0];
  const cancelAction = opts.actions.find((a) => a.intent === "cancel");

  const confirm = (): void => {
    if (defaultAction !== undefined) run(defaultAction);
  };
  const cancel = (): void => {
    if (cancelAction !== undefined) run(cancelAction);
    else close();
  };

  const buttons = opts.actions.map((action) =>
    makeButton({ id: action.id, label: action.label, onPress: () => run(action) }),
  );
  const actionRow = makeRow({ spacing: ACTION_SPACING, children: buttons });
  const children: Box[] = [];
  if (opts.message !== undefined) {
    children.push(
      new BoxNode({
        w: opts.message.length * MESSAGE_CHAR_WIDTH,
        h: MESSAGE_HEIGHT,
        label: opts.message,
      }),
    );
  }
  children.push(actionRow);

  const win = makeWindow({
    id: opts.id,
    title: opts.title,
    width: opts.width,
    spacing: ACTION_SPACING,
    anchor: opts.anchor ?? { self: "center", target: "center", ref: "screen" },
    children,
    onClose: () => {
      open = false;
      opts.onClose?.(handle);
    },
  });

  win.box.on("onKey", (_box, event) => {
    if (event.kind !== "keyDown") return false;
    if (event.key === "Enter") {
      confirm();
      return true;
    }
    // Modal dialogs get Escape through their layer.
    if (event.key === "Escape" && !modal && closeOnEscape) {
      cancel();
      return true;
    }
    return false;
  });

  const handle: DialogHandle = Object.freeze({
    window: win,
    buttons: Object.freeze(buttons),
    open: (target: Surface) => {
      if (open || win.isClosed()) return;
      surface = target;
      open = true;
      target.root.addChild(win.box);
      if (modal) target.openModal(win.box, { closeOnEscape, onClose: cancel });
      else target.requestFocus(win.box);
    },
    close,
    isOpen: () => open,
    confirm,
    cancel,
  });
  return handle;
}

/** Ok/Cancel dialog. */
export function confirmDialog(
  opts: Readonly<{
    id?: string;
    title: string;
    message: string;
    confirmLabel?: string;
    cancelLabel?: string;
    onConfirm?: () => void;
    onCancel?: () => void;
  }>,
): DialogHandle {
  return makeDialog({
    id: opts.id,
    title: opts.title,
    message: opts.message,
    actions: [
      { label: opts.confirmLabel ?? "Ok", intent: "primary", onPress: () => opts.onConfirm?.() },
      { label: opts.cancelLabel ?? "Cancel", intent: "cancel", onPress: () => opts.onCancel?.() },
    ],
  });
}
