import type { Session } from "../session.js";

/**
 * Route mouse drag and wheel input on `element` to the session's camera
 * controller. Move/up listen on the document so a drag survives leaving the
 * canvas. The viewport is re-measured from the element at the start of every
 * gesture, so drags made while geometry is still loading or after a resize
 * convert pixels with the real size. Returns an unbind function.
 */
export function bindPointerInput(element: HTMLElement, session: Session): () => void {
  const doc = element.ownerDocument;

  const syncViewport = () => {
    if (!session.camera || session.metadata?.resolution) return;
    const { clientWidth, clientHeight } = element;
    if (clientWidth > 0 && clientHeight > 0) session.camera.setViewport(clientWidth, clientHeight);
  };

  const onDown = (e: MouseEvent) => {
    if (!session.camera) return;
    e.preventDefault();
    syncViewport();
    session.camera.beginDrag(e.clientX, e.clientY);
  };
  const onMove = (e: MouseEvent) => {
    if (session.camera?.dragging) session.camera.drag(e.clientX, e.clientY);
  };
  const onUp = () => {
    if (session.camera?.dragging) session.camera.endDrag();
  };
  const onWheel = (e: WheelEvent) => {
    if (!session.camera) return;
    e.preventDefault();
    syncViewport();
    session.camera.wheel(e.deltaY);
  };

  element.addEventListener("mousedown", onDown);
  doc.addEventListener("mousemove", onMove);
  doc.addEventListener("mouseup", onUp);
  element.addEventListener("wheel", onWheel, { passive: false });

  return () => {
    element.removeEventListener("mousedown", onDown);
    doc.removeEventListener("mousemove", onMove);
    doc.removeEventListener("mouseup", onUp);
    element.removeEventListener("wheel", onWheel);
  };
}
