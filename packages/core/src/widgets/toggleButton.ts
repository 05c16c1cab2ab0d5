/**
 * packages/core/src/widgets/toggleButton.ts — Button with an on/off state.
 *
 * Each activation (click, Enter or Space) flips the state. The fill follows the
 * state, and `onChange` runs whenever it changes, including from `setToggled`.
 */

import type { Box } from "../runtime/box.js";
import { type ButtonOptions, makeButton } from "./button.js";

export type ToggleButtonOptions = Omit<ButtonOptions, "onPress"> &
  Readonly<{
    toggled?: boolean;
    /** Fill while toggled on. */
    toggledFill?: string;
    onChange?: (toggled: boolean, button: Box) => void;
  }>;

export type ToggleButtonHandle = Readonly<{
  box: Box;
  isToggled: () => boolean;
  /** Returns whether the state changed. `notify: false` skips `onChange`. */
  setToggled: (on: boolean, notify?: boolean) => boolean;
  toggle: () => boolean;
}>;

export function makeToggleButton(opts: ToggleButtonOptions): ToggleButtonHandle {
  const { toggled: initial, toggledFill, onChange, ...buttonOpts } = opts;
  const offFill = buttonOpts.fill ?? "button";
  const onFill = toggledFill ?? "buttonToggled";
  let toggled = initial ?? false;

  const box = makeButton({
    ...buttonOpts,
    fill: toggled ? onFill : offFill,
    onPress: () => {
      setToggled(!toggled);
    },
  });

  const setToggled = (on: boolean, notify = true): boolean => {
    if (on === toggled) return false;
    toggled = on;
    box.setAppearance({ fill: on ? onFill : offFill });
    if (notify) onChange?.(on, box);
    return true;
  };

  return Object.freeze({
    box,
    isToggled: () => toggled,
    setToggled,
    toggle: () => setToggled(!toggled),
  });
}
