import type { UploadSet } from "../utils/fileValidation";

const encoder = new TextEncoder();

function uint32(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value);
  return bytes;
}

/**
 * Serializes the parts that identify an upload: entry count, then for each entry its organ
 * tag and payload, each length-prefixed so that no two distinct sets share an encoding.
 */
export function encodeUploadSet(uploadSet: UploadSet): Uint8Array<ArrayBuffer> {
  const chunks: Uint8Array[] = [uint32(uploadSet.length)];
  for (const entry of uploadSet) {
    const organ = encoder.encode(entry.organ);
    chunks.push(uint32(organ.byteLength), organ, uint32(entry.data.byteLength), entry.data);
  }

  const total = chunks.reduce((size, chunk) => size + chunk.byteLength, 0);
  const buffer = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    buffer.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return buffer;
}

export async function fingerprintUploadSet(uploadSet: UploadSet): Promise<string> {
  const digest = await crypto.subtle.digest("SHA-256", encodeUploadSet(uploadSet));
  const hashHex = Array.from(new Uint8Array(digest))
    .map(b => b.toString(16).padStart(2, "0"))
    .join("");
  return `identification_${hashHex}`;
}
