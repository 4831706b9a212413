/**
 * Playback position. Playing advances one frame per display tick, independent
 * of the trajectory's own sampling interval.
 */
export class FrameCursor {
  current = 0;
  playing = true;
  loops = 0;

  /** Called once per tick before drawing. */
  wrap(frameCount: number): void {
    if (this.current > frameCount - 1) {
      this.current = 0;
      this.loops++;
    }
  }

  advance(): void {
    if (this.playing) this.current++;
  }

  scrub(frame: number, frameCount: number): void {
    const f = Math.floor(frame);
    this.current = Math.max(0, Math.min(frameCount - 1, Number.isFinite(f) ? f : 0));
  }

  togglePlay(): boolean {
    this.playing = !this.playing;
    return this.playing;
  }
}
