import { open } from "node:fs/promises";

/**
 * First `length` bytes of a file (fewer when the file is shorter).
 */
export const readHeader = async (path: string, length: number): Promise<Uint8Array> => {
  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
};

export const startsWith = (header: Uint8Array, magic: readonly number[], offset = 0): boolean =>
  header.length >= offset + magic.length && magic.every((byte, i) => header[offset + i] === byte);
