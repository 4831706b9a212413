/** Little-endian float32 base64, the same encoding the host uses. */
export function encodeFloat32(values: ArrayLike<number>): string {
  const view = new DataView(new ArrayBuffer(values.length * 4));
  for (let i = 0; i < values.length; i++) view.setFloat32(i * 4, values[i], true);
  return Buffer.from(view.buffer).toString("base64");
}

export function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}
