/**
 * Pixel-stream framing: a 12-byte header followed by tightly packed RGB or
 * RGBW bytes, one UDP datagram per frame.
 *
 *   0..3   magic "ALV" + version 0x01
 *   4      flags (bit0 data present, bit4 RGBW packing)
 *   5      sequence 0..255, wraps
 *   6..7   payload length, big-endian
 *   8..11  channel offset, big-endian
 */

export const FRAME_MAGIC = Uint8Array.of(0x41, 0x4c, 0x56, 0x01);
export const HEADER_LENGTH = 12;
export const FLAG_DATA = 0x01;
export const FLAG_RGBW = 0x10;
const MAX_PAYLOAD_LENGTH = 0xffff;

export type HeaderFields = {
  length: number;
  offset: number;
  sequence: number;
  rgbw: boolean;
};

export function buildHeader({ length, offset, sequence, rgbw }: HeaderFields): Uint8Array {
  if (!Number.isInteger(length) || length < 0 || length > MAX_PAYLOAD_LENGTH) {
    throw new RangeError(`Frame payload length out of range: ${length}`);
  }
  if (!Number.isInteger(offset) || offset < 0 || offset > 0xffffffff) {
    throw new RangeError(`Channel offset out of range: ${offset}`);
  }
  const header = new Uint8Array(HEADER_LENGTH);
  const view = new DataView(header.buffer);
  header.set(FRAME_MAGIC, 0);
  header[4] = rgbw ? FLAG_DATA | FLAG_RGBW : FLAG_DATA;
  header[5] = sequence & 0xff;
  view.setUint16(6, length, false);
  view.setUint32(8, offset, false);
  return header;
}

export function encodeFrame(data: Uint8Array, fields: Omit<HeaderFields, "length">): Uint8Array {
  const header = buildHeader({ ...fields, length: data.length });
  const packet = new Uint8Array(HEADER_LENGTH + data.length);
  packet.set(header, 0);
  packet.set(data, HEADER_LENGTH);
  return packet;
}

export type DecodedFrame = HeaderFields & { data: Uint8Array };

/** Returns null for anything that is not a well-formed frame. */
export function decodeFrame(packet: Uint8Array): DecodedFrame | null {
  if (packet.length < HEADER_LENGTH) return null;
  for (let i = 0; i < FRAME_MAGIC.length; i++) {
    if (packet[i] !== FRAME_MAGIC[i]) return null;
  }
  const view = new DataView(packet.buffer, packet.byteOffset, packet.byteLength);
  const flags = view.getUint8(4);
  const length = view.getUint16(6, false);
  if (packet.length < HEADER_LENGTH + length) return null;
  return {
    rgbw: (flags & FLAG_RGBW) !== 0,
    sequence: view.getUint8(5),
    length,
    offset: view.getUint32(8, false),
    data: packet.subarray(HEADER_LENGTH, HEADER_LENGTH + length),
  };
}

export function bytesPerPixel(rgbw: boolean): 3 | 4 {
  return rgbw ? 4 : 3;
}
