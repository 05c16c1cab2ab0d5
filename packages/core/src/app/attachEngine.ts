/**
 * packages/core/src/app/attachEngine.ts — Drive a surface from an engine.
 *
 * Input is queued as it arrives and routed on the next frame; each frame runs
 * `surface.tick` and replays its draw list into the backend.
 */

import type { EngineBackend, Unsubscribe } from "../backend.js";
import type { DrawCommand, FrameReport, Surface } from "./surface.js";

export type AttachEngineOptions = Readonly<{
  /** Observe each frame after it was drawn. */
  onFrameReport?: (report: FrameReport) => void;
}>;

function draw(backend: EngineBackend, cmd: DrawCommand): void {
  switch (cmd.kind) {
    case "rect":
      backend.drawRect(cmd.rect, cmd.z, cmd.fill);
      return;
    case "sprite":
      backend.drawSprite(cmd.rect, cmd.z, cmd.texture);
      return;
    case "text":
      backend.drawText?.(cmd.rect, cmd.z, cmd.text);
      return;
  }
}

/** Returns a detach function; calling it more than once is harmless. */
export function attachEngine(
  surface: Surface,
  backend: EngineBackend,
  opts: AttachEngineOptions = {},
): Unsubscribe {
  surface.resize(backend.screenSize());

  const subs: Unsubscribe[] = [
    backend.onInput((event) => {
      surface.enqueue(event);
    }),
    backend.onFrame((frame) => {
      const report = surface.tick(frame);
      for (const cmd of report.draws) draw(backend, cmd);
      opts.onFrameReport?.(report);
    }),
  ];
  if (backend.onResize) {
    subs.push(
      backend.onResize((size) => {
        surface.resize(size);
      }),
    );
  }

  let attached = true;
  return () => {
    if (!attached) return;
    attached = false;
    for (const unsub of subs) unsub();
  };
}
