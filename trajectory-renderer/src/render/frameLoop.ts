import * as THREE from "three";
import { MeshLibrary } from "../mesh/library.js";
import type { Session } from "../session.js";
import { ViewerError } from "../utils/errors.js";
import { createDrawable, type Drawable } from "./drawables.js";

/** The slice of THREE.WebGLRenderer the loop drives. */
export type RenderSurface = Pick<THREE.WebGLRenderer, "setClearColor" | "clear" | "render" | "setSize" | "debug">;

export interface Scheduler {
  request(callback: () => void): number;
  cancel(handle: number): void;
}

export interface FrameLoopOptions {
  /** Called once when rendering stops for good (shader build failure). */
  onFatal?: (error: ViewerError) => void;
  /** Current drawing-buffer size in CSS pixels, read every tick unless the simulation fixes a resolution. */
  measure?: () => { width: number; height: number };
}

/**
 * Per-refresh render driver. Never waits on the loader: until the session is
 * loaded each tick only clears the framebuffer.
 */
export class FrameLoop {
  private session: Session;
  private surface: RenderSurface;
  private onFatal?: (error: ViewerError) => void;
  private measure?: () => { width: number; height: number };
  private scene: THREE.Scene | null = null;
  private meshes: MeshLibrary | null = null;
  private drawables: Drawable[] = [];
  private scheduler: Scheduler | null = null;
  private handle: number | null = null;
  private clearColor = new THREE.Color();

  constructor(session: Session, surface: RenderSurface, opts: FrameLoopOptions = {}) {
    this.session = session;
    this.surface = surface;
    this.onFatal = opts.onFatal;
    this.measure = opts.measure;
    surface.debug.checkShaderErrors = true;
    surface.debug.onShaderError = (gl, program) => {
      this.reportShaderFailure(gl.getProgramInfoLog(program) ?? "no info log");
    };
  }

  get running(): boolean {
    return this.handle !== null;
  }

  /** Drawables built for the loaded geometries, in registry order. */
  get items(): readonly Drawable[] {
    return this.drawables;
  }

  start(scheduler: Scheduler) {
    this.scheduler = scheduler;
    this.schedule();
  }

  stop() {
    if (this.scheduler && this.handle !== null) this.scheduler.cancel(this.handle);
    this.handle = null;
    this.scheduler = null;
  }

  /**
   * One display refresh.
   * @returns true when geometry was drawn, false for an idle or halted tick
   */
  tick(): boolean {
    const session = this.session;
    if (session.fatal) return false;

    const background = session.metadata?.backgroundColor ?? session.options.defaultBackground;
    this.surface.setClearColor(this.clearColor.setRGB(background[0], background[1], background[2]));
    this.surface.clear();

    const { metadata, camera } = session;
    if (!session.loaded || !metadata || !camera) return false;
    const scene = this.scene ?? this.buildScene();

    if (this.measure && !metadata.resolution) {
      const { width, height } = this.measure();
      if (width > 0 && height > 0) camera.setViewport(width, height);
    }
    camera.update();
    session.cursor.wrap(metadata.frameCount);
    const frame = session.cursor.current;
    for (const drawable of this.drawables) drawable.update(frame);

    this.surface.render(scene, camera.camera);
    if (session.fatal) return false;

    session.cursor.advance();
    return true;
  }

  reportShaderFailure(info: string) {
    if (this.session.fatal) return;
    const error = new ViewerError("ShaderBuildFailure", `Shader program failed to build: ${info}`);
    this.session.fatal = error;
    this.session.diagnostics.report(error);
    this.stop();
    this.onFatal?.(error);
  }

  dispose() {
    this.stop();
    for (const drawable of this.drawables) drawable.dispose();
    this.drawables = [];
    this.meshes?.dispose();
    this.meshes = null;
    this.scene = null;
  }

  private buildScene(): THREE.Scene {
    const { metadata, registry, options, diagnostics } = this.session;
    const scene = new THREE.Scene();
    this.scene = scene;
    if (!metadata) return scene;

    const meshes = new MeshLibrary(metadata.dimension, options);
    this.meshes = meshes;
    for (const record of registry.all()) {
      try {
        const drawable = createDrawable(record, { metadata, options, meshes, registry, diagnostics });
        scene.add(drawable.object);
        this.drawables.push(drawable);
      } catch (e) {
        if (!(e instanceof ViewerError)) throw e;
        diagnostics.report(e);
      }
    }
    if (metadata.resolution) this.surface.setSize(metadata.resolution[0], metadata.resolution[1]);
    return scene;
  }

  private schedule() {
    const scheduler = this.scheduler;
    if (!scheduler || this.session.fatal) return;
    this.handle = scheduler.request(() => {
      this.handle = null;
      this.tick();
      this.schedule();
    });
  }
}
