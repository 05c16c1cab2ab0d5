/**
 * packages/core/src/widgets/multipleChoice.ts — A set of toggle buttons, one per choice.
 *
 * With `allowMultiple` off the set behaves like radio buttons: turning one
 * choice on turns the others off first. Turning the active choice off again is
 * allowed, so a single-choice set may end up with nothing selected.
 *
 * `onSelect` runs once per choice whose state changes; `selected` in the call
 * reflects every button at that moment.
 */

import { invalidProps } from "../errors.js";
import type { Box } from "../runtime/box.js";
import { makeColumn, makeRow } from "./containers.js";
import { type ToggleButtonHandle, type ToggleButtonOptions, makeToggleButton } from "./toggleButton.js";

export type MultipleChoiceOptions = Readonly<{
  id?: string;
  choices: readonly string[];
  allowMultiple?: boolean;
  /** Choices selected on creation (no `onSelect`). */
  defaults?: readonly string[];
  direction?: "row" | "column";
  spacing?: number;
  /** Style shared by every choice button. */
  button?: Omit<ToggleButtonOptions, "id" | "label" | "toggled" | "onChange">;
  onSelect?: (selected: readonly string[], changed: string, toggled: boolean) => void;
}>;

export type MultipleChoiceHandle = Readonly<{
  box: Box;
  buttons: ReadonlyMap<string, ToggleButtonHandle>;
  /** Selected choices in choice order. */
  selected: () => readonly string[];
  /** @throws BoxError for an unknown choice */
  select: (choice: string, on?: boolean) => void;
  /** Put every button back to `defaults`, reporting each change. */
  resetToDefaults: () => void;
}>;

function validate(opts: MultipleChoiceOptions): readonly string[] {
  const seen = new Set<string>();
  for (const c of opts.choices) {
    if (seen.has(c)) invalidProps(`multiple choice: duplicate choice "${c}"`);
    seen.add(c);
  }
  const defaults = opts.defaults ?? [];
  for (const d of defaults) {
    if (!seen.has(d)) invalidProps(`multiple choice: default "${d}" is not a choice`);
  }
  if (opts.allowMultiple !== true && defaults.length > 1) {
    invalidProps("multiple choice: more than one default needs allowMultiple");
  }
  return defaults;
}

export function makeMultipleChoice(opts: MultipleChoiceOptions): MultipleChoiceHandle {
  const defaults = validate(opts);
  const allowMultiple = opts.allowMultiple === true;
  const group = (opts.direction === "column" ? makeColumn : makeRow)({
    id: opts.id,
    spacing: opts.spacing ?? 4,
  });

  const buttons = new Map<string, ToggleButtonHandle>();
  const selected = (): readonly string[] => opts.choices.filter((c) => buttons.get(c)?.isToggled() === true);

  const changed = (choice: string, on: boolean): void => {
    if (on && !allowMultiple) {
      for (const [other, b] of buttons) {
        if (other !== choice) b.setToggled(false);
      }
    }
    opts.onSelect?.(selected(), choice, on);
  };

  for (const choice of opts.choices) {
    const b = makeToggleButton({
      ...opts.button,
      id: `${group.id}.${choice}`,
      label: choice,
      toggled: defaults.includes(choice),
      onChange: (on) => changed(choice, on),
    });
    buttons.set(choice, b);
    group.addChild(b.box);
  }

  const select = (choice: string, on = true): void => {
    const b = buttons.get(choice);
    if (b === undefined) invalidProps(`multiple choice: unknown choice "${choice}"`);
    b.setToggled(on);
  };

  return Object.freeze({
    box: group,
    buttons,
    selected,
    select,
    resetToDefaults: () => {
      for (const [choice, b] of buttons) b.setToggled(defaults.includes(choice));
    },
  });
}
