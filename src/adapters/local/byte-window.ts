// ---------------------------------------------------------------------------
// Bounded reads: the first and last bytes of a file, never the whole file.
// ---------------------------------------------------------------------------

import { open } from "node:fs/promises";

export interface ByteWindow {
  head: Buffer;
  /** Empty when the file fits entirely in `head`. */
  tail: Buffer;
}

export async function readByteWindow(
  filePath: string,
  headBytes: number,
  tailBytes: number,
): Promise<ByteWindow> {
  const handle = await open(filePath, "r");
  try {
    const { size } = await handle.stat();

    const headLength = Math.min(size, headBytes);
    const head = Buffer.alloc(headLength);
    await handle.read(head, 0, headLength, 0);

    const tailStart = Math.max(headLength, size - tailBytes);
    const tailLength = size - tailStart;
    const tail = Buffer.alloc(tailLength);
    if (tailLength > 0) {
      await handle.read(tail, 0, tailLength, tailStart);
    }

    return { head, tail };
  } finally {
    await handle.close();
  }
}
