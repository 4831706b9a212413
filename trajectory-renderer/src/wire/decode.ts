import { ViewerError } from "../utils/errors.js";

function base64ToBytes(payload: string): Uint8Array {
  let binary: string;
  try {
    binary = atob(payload);
  } catch {
    throw new ViewerError("MalformedPayload", "Payload is not valid base64 text");
  }
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) bytes[i] = binary.charCodeAt(i);
  return bytes;
}

/**
 * Decode a base64 blob of little-endian IEEE-754 float32 values.
 * Reads through a DataView so the result does not depend on host byte order.
 */
export function decodeFloat32(payload: string): Float32Array {
  const bytes = base64ToBytes(payload);
  if (bytes.byteLength % 4 !== 0) {
    throw new ViewerError(
      "MalformedPayload",
      `Payload byte length ${bytes.byteLength} is not a multiple of 4`
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out = new Float32Array(bytes.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = view.getFloat32(i * 4, true);
  return out;
}
