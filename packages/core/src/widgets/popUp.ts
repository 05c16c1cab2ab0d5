/**
 * packages/core/src/widgets/popUp.ts — Pop-ups anchored to another box.
 *
 * A pop-up is attached to the anchor box's root (so it paints above the
 * anchor's siblings) and positioned relative to the anchor box. Hiding
 * detaches it without destroying it and drops its reference to the anchor box.
 */

import type { Box, PositionalAnchorInput } from "../runtime/box.js";

export type PopUpOptions = Readonly<{
  /** Default: the pop-up's top-left at the anchor's bottom-left. */
  anchor?: Omit<PositionalAnchorInput, "ref">;
}>;

export function isPopUpShown(popUp: Box): boolean {
  return popUp.parent !== null;
}

export function showPopUp(anchorBox: Box, popUp: Box, opts: PopUpOptions = {}): void {
  const root = anchorBox.root();
  if (popUp.parent !== root) root.addChild(popUp);
  popUp.setAnchor({
    self: opts.anchor?.self ?? "top-left",
    target: opts.anchor?.target ?? "bottom-left",
    offset: opts.anchor?.offset,
    ref: anchorBox,
  });
  popUp.bringToFront();
}

export function hidePopUp(popUp: Box): boolean {
  const parent = popUp.parent;
  if (parent === null) return false;
  popUp.setAnchor(null);
  return parent.removeChild(popUp);
}

/** Show when hidden, hide when shown. Returns whether the pop-up is now shown. */
export function togglePopUp(anchorBox: Box, popUp: Box, opts: PopUpOptions = {}): boolean {
  if (isPopUpShown(popUp)) {
    hidePopUp(popUp);
    return false;
  }
  showPopUp(anchorBox, popUp, opts);
  return true;
}
