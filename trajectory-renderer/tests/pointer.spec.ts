// @vitest-environment jsdom
import { describe, it, expect, beforeEach } from "vitest";
import { PlanarCamera } from "../src/camera/index.js";
import { ChunkedLoader } from "../src/load/loader.js";
import { Session } from "../src/session.js";
import { bindPointerInput } from "../src/viewer/pointer.js";
import { FakeHost } from "./helpers/fakeHost.js";

function setClientSize(element: HTMLElement, width: number, height: number) {
  Object.defineProperty(element, "clientWidth", { configurable: true, value: width });
  Object.defineProperty(element, "clientHeight", { configurable: true, value: height });
}

function drag(element: HTMLElement, dx: number, dy: number) {
  element.dispatchEvent(new MouseEvent("mousedown", { clientX: 0, clientY: 0 }));
  element.ownerDocument.dispatchEvent(new MouseEvent("mousemove", { clientX: dx, clientY: dy }));
  element.ownerDocument.dispatchEvent(new MouseEvent("mouseup"));
}

describe("bindPointerInput", () => {
  let canvas: HTMLCanvasElement;
  let session: Session;
  let camera: PlanarCamera;

  beforeEach(() => {
    canvas = document.createElement("canvas");
    document.body.appendChild(canvas);
    session = new Session();
    camera = new PlanarCamera([10, 20], 1.1);
    camera.setViewport(200, 100);
    session.camera = camera;
  });

  it("drags the view while the button is held", () => {
    bindPointerInput(canvas, session);

    canvas.dispatchEvent(new MouseEvent("mousedown", { clientX: 0, clientY: 0, bubbles: true }));
    document.dispatchEvent(new MouseEvent("mousemove", { clientX: 10, clientY: 5 }));
    expect(camera.dragging).toBe(true);
    expect(camera.view()).toEqual({ centerX: 3, centerY: 11, halfExtent: 10 });

    document.dispatchEvent(new MouseEvent("mouseup"));
    expect(camera.dragging).toBe(false);
    document.dispatchEvent(new MouseEvent("mousemove", { clientX: 50, clientY: 50 }));
    expect(camera.view().centerX).toBe(3);
  });

  it("zooms on wheel and keeps the page from scrolling", () => {
    bindPointerInput(canvas, session);
    const event = new WheelEvent("wheel", { deltaY: 100, cancelable: true });
    canvas.dispatchEvent(event);

    expect(event.defaultPrevented).toBe(true);
    expect(camera.view().halfExtent).toBeCloseTo(11, 9);
  });

  it("does nothing before the camera exists", () => {
    session.camera = undefined;
    bindPointerInput(canvas, session);
    const event = new WheelEvent("wheel", { deltaY: 100, cancelable: true });
    canvas.dispatchEvent(event);
    expect(event.defaultPrevented).toBe(false);
  });

  it("stops listening once unbound", () => {
    const unbind = bindPointerInput(canvas, session);
    unbind();

    canvas.dispatchEvent(new MouseEvent("mousedown", { clientX: 0, clientY: 0 }));
    canvas.dispatchEvent(new WheelEvent("wheel", { deltaY: 100 }));
    expect(camera.dragging).toBe(false);
    expect(camera.view().halfExtent).toBe(10);
  });

  it("measures the canvas for drags made while geometries are still loading", async () => {
    const loading = new Session();
    const host = new FakeHost(
      { box_size: [10, 10], dimension: 2, frame_count: 1, geometry: ["disks"] },
      { disks: { meta: { shape: "Disk", count: 1, fields: { position: "static" } }, arrays: { position: [1, 1] } } }
    );
    await new ChunkedLoader(loading, host).loadMetadata();
    expect(loading.loaded).toBe(false);

    setClientSize(canvas, 200, 100);
    bindPointerInput(canvas, loading);
    drag(canvas, 10, 0);

    const cam = loading.camera;
    expect(cam).toBeInstanceOf(PlanarCamera);
    if (!(cam instanceof PlanarCamera)) return;
    // half extent 5 over 100 px: 0.1 world units per pixel
    expect(cam.view().centerX).toBeCloseTo(4, 9);
    expect(cam.view().centerY).toBeCloseTo(5, 9);
  });

  it("picks up a resized canvas on the next gesture", () => {
    bindPointerInput(canvas, session);
    setClientSize(canvas, 800, 400);
    drag(canvas, 10, 0);
    // half extent 10 over 400 px: 0.05 world units per pixel
    expect(camera.view().centerX).toBeCloseTo(4.5, 9);
  });
});
