const SIGNATURE_LENGTH = 8;

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  return c >>> 0;
});

export function crc32(bytes: Uint8Array): number {
  let c = 0xffffffff;
  for (const b of bytes) c = CRC_TABLE[(c ^ b) & 0xff] ^ (c >>> 8);
  return (c ^ 0xffffffff) >>> 0;
}

export type PngChunk = { type: string; data: Buffer };

export function pngChunks(png: Buffer): PngChunk[] {
  const out: PngChunk[] = [];
  let at = SIGNATURE_LENGTH;
  while (at + 8 <= png.length) {
    const length = png.readUInt32BE(at);
    const type = png.toString("latin1", at + 4, at + 8);
    out.push({ type, data: png.subarray(at + 8, at + 8 + length) });
    at += 12 + length;
  }
  return out;
}

function encodeChunk({ type, data }: PngChunk): Buffer {
  const body = Buffer.concat([Buffer.from(type, "latin1"), data]);
  const head = Buffer.alloc(4);
  head.writeUInt32BE(data.length);
  const tail = Buffer.alloc(4);
  tail.writeUInt32BE(crc32(body));
  return Buffer.concat([head, body, tail]);
}

/** Records the DPI as a pHYs chunk right after IHDR, replacing any existing one. */
export function withPhysicalDpi(png: Buffer, dpi: number): Buffer {
  const ppm = Math.round(dpi / 0.0254);
  const phys = Buffer.alloc(9);
  phys.writeUInt32BE(ppm, 0);
  phys.writeUInt32BE(ppm, 4);
  phys.writeUInt8(1, 8); // unit: metre

  const chunks = pngChunks(png).filter(c => c.type !== "pHYs");
  const [ihdr, ...rest] = chunks;
  if (ihdr?.type !== "IHDR") throw new Error("not a PNG: IHDR missing");
  return Buffer.concat([
    png.subarray(0, SIGNATURE_LENGTH),
    ...[ihdr, { type: "pHYs", data: phys }, ...rest].map(encodeChunk),
  ]);
}
