/**
 * @boxweave/core
 *
 * Engine-agnostic UI box runtime: box trees, integer layout groups, anchored
 * placement, hit testing, drag and drop, rubber-band selection, focus and
 * modal layers. The engine supplies frames, input and draw primitives through
 * `EngineBackend`.
 */

// =============================================================================
// Errors & diagnostics
// =============================================================================

export {
  BoxError,
  CycleError,
  CyclicAnchorError,
  NotFocusableError,
  type BoxErrorCode,
  type NotFocusableReason,
} from "./errors.js";

export {
  createDiagnostics,
  formatDiagnostic,
  type DiagnosticArea,
  type Diagnostics,
  type DiagnosticsOptions,
  type ErrorSink,
  type WarnSink,
} from "./diagnostics.js";

export {
  DEFAULT_SURFACE_CONFIG,
  resolveSurfaceConfig,
  type ResolvedSurfaceConfig,
  type SurfaceConfig,
} from "./config.js";

// =============================================================================
// Input events
// =============================================================================

export {
  LOCK_MODIFIERS,
  MOD_ALT,
  MOD_CAPS_LOCK,
  MOD_CTRL,
  MOD_META,
  MOD_NUM_LOCK,
  MOD_SCROLL_LOCK,
  MOD_SHIFT,
  dispatchResult,
  hasModifier,
  keyDown,
  keyUp,
  pointerMove,
  pointerPress,
  pointerRelease,
  type DispatchResult,
  type DispatchRoute,
  type InputEvent,
  type KeyDownEvent,
  type KeyEvent,
  type KeyUpEvent,
  type PointerButton,
  type PointerEvent,
  type PointerMoveEvent,
  type PointerPressEvent,
  type PointerReleaseEvent,
} from "./events.js";

// =============================================================================
// Geometry & layout
// =============================================================================

export {
  ANCHOR_POINTS,
  type Align,
  type AnchorPoint,
  type Axis,
  type CrossAlign,
  type GroupLayout,
  type LayoutItem,
  type Point,
  type Rect,
  type Size,
  type Spacing,
  type SpacingInput,
} from "./layout/types.js";

export {
  ZERO_RECT,
  alignToPoint,
  anchorOffset,
  boundingRect,
  clampRectWithin,
  containsPoint,
  intersectRect,
  overlapArea,
  rect,
  rectFromPoints,
  rectsEqual,
  rectsIntersect,
  resolveSpacing,
  translateRect,
} from "./layout/geometry.js";

export {
  findAnchorCycle,
  resolveAbsoluteRects,
  type AnchorNode,
  type AnchorRef,
  type AnchorSpec,
} from "./layout/anchor.js";

export { distributeInteger } from "./layout/distributeInteger.js";
export { computeStackLayout, type StackPolicy } from "./layout/stack.js";
export { chooseGridColumns, computeGridLayout, type GridPolicy } from "./layout/grid.js";
export {
  computeGroupLayout,
  resolveLayoutPolicy,
  type LayoutKind,
  type LayoutPolicy,
  type LayoutPolicyInput,
} from "./layout/group.js";
export {
  collectIntersecting,
  hitTest,
  hitTestAll,
  type HitTestOptions,
  type RectLookup,
} from "./layout/hitTest.js";

// =============================================================================
// Boxes & runtime
// =============================================================================

export {
  Box,
  describeBox,
  makeBox,
  type Appearance,
  type BoxHandlers,
  type BoxOptions,
  type DragPolicy,
  type DropTarget,
  type HandlerName,
  type PositionalAnchor,
  type PositionalAnchorInput,
  type Selectable,
} from "./runtime/box.js";

export { computeFocusList, computeMovedFocus, type FocusMove } from "./runtime/focus.js";
export type { ModalLayer } from "./runtime/layers.js";
export type { DragMode, DragOutcome, DragPhase, DragSession } from "./runtime/drag.js";

// =============================================================================
// Surface & engine
// =============================================================================

export {
  Surface,
  createSurface,
  type DrawCommand,
  type FrameInfo,
  type FrameReport,
  type OpenModalOptions,
  type SurfaceOptions,
} from "./app/surface.js";

export type { EngineBackend, Unsubscribe } from "./backend.js";
export { attachEngine, type AttachEngineOptions } from "./app/attachEngine.js";

// =============================================================================
// Key maps
// =============================================================================

export * from "./keybindings/index.js";

// =============================================================================
// Widgets
// =============================================================================

export * from "./widgets/index.js";
