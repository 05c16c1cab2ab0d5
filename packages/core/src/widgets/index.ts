export { DEFAULT_BUTTON_HEIGHT, isActivationKey, makeButton } from "./button.js";
export type { ButtonOptions } from "./button.js";
export { makeColumn, makeGrid, makeRow } from "./containers.js";
export type { GroupOptions } from "./containers.js";
export { confirmDialog, makeDialog } from "./dialog.js";
export type { DialogAction, DialogActionIntent, DialogHandle, DialogOptions } from "./dialog.js";
export { hidePopUp, isPopUpShown, showPopUp, togglePopUp } from "./popUp.js";
export type { PopUpOptions } from "./popUp.js";
export { DEFAULT_TITLE_BAR_HEIGHT, DEFAULT_WINDOW_PADDING, makeWindow } from "./window.js";
export type { WindowHandle, WindowOptions } from "./window.js";
export { makeMultipleChoice } from "./multipleChoice.js";
export type { MultipleChoiceHandle, MultipleChoiceOptions } from "./multipleChoice.js";
export { makeToggleButton } from "./toggleButton.js";
export type { ToggleButtonHandle, ToggleButtonOptions } from "./toggleButton.js";
