import * as THREE from "three";
import type { ViewerOptions } from "../config.js";
import type { SimulationHost } from "../host/types.js";
import { ChunkedLoader } from "../load/loader.js";
import { FrameLoop } from "../render/frameLoop.js";
import { Session } from "../session.js";
import { consoleSink, type DiagnosticListener } from "../utils/diagnostics.js";
import type { ViewerError } from "../utils/errors.js";
import { bindPointerInput } from "./pointer.js";

export interface MountOptions extends ViewerOptions {
  /** Receives every diagnostic; defaults to the console. Pass false to stay silent. */
  log?: DiagnosticListener | false;
  onFatal?: (error: ViewerError) => void;
}

export interface ViewerHandle {
  session: Session;
  /** Resolves once loading finished (true) or stopped on a metadata error (false). */
  loading: Promise<boolean>;
  togglePlay(): boolean;
  scrub(frame: number): boolean;
  dispose(): void;
}

/**
 * Browser entry point: wires a WebGL renderer on `canvas` to a new session,
 * starts the requestAnimationFrame loop and begins streaming from `host`.
 */
export function mountViewer(canvas: HTMLCanvasElement, host: SimulationHost, opts: MountOptions = {}): ViewerHandle {
  const session = new Session(opts);
  const unsubscribe = opts.log === false ? undefined : session.diagnostics.subscribe(opts.log ?? consoleSink);

  const renderer = new THREE.WebGLRenderer({ canvas, antialias: true });
  renderer.setPixelRatio(window.devicePixelRatio);
  renderer.setSize(canvas.clientWidth, canvas.clientHeight, false);

  const loop = new FrameLoop(session, renderer, {
    onFatal: opts.onFatal,
    measure: () => ({ width: canvas.clientWidth, height: canvas.clientHeight }),
  });
  const unbind = bindPointerInput(canvas, session);
  loop.start({
    request: (cb) => window.requestAnimationFrame(cb),
    cancel: (handle) => window.cancelAnimationFrame(handle),
  });

  const loading = new ChunkedLoader(session, host).loadAll();

  return {
    session,
    loading,
    togglePlay: () => session.togglePlay(),
    scrub: (frame) => session.scrub(frame),
    dispose() {
      loop.dispose();
      unbind();
      unsubscribe?.();
      renderer.dispose();
    },
  };
}
