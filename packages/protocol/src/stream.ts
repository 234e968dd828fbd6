import { CAN_FRAME_WIRE_LEN, decodeCanFrame, type CanFrameDecoded } from "./can";

/**
 * Reassembles fixed-width frames from a TCP byte stream. A chunk may carry
 * part of a frame, several frames, or both; incomplete bytes wait for the
 * next chunk and are never decoded on their own.
 */
export class FrameStream {
  private buffered: Buffer = Buffer.alloc(0);

  get pendingBytes() {
    return this.buffered.length;
  }

  /** Throws `ProtocolError` on a frame with an invalid length byte. */
  push(chunk: Buffer): CanFrameDecoded[] {
    this.buffered =
      this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
    const frames: CanFrameDecoded[] = [];
    let offset = 0;
    while (this.buffered.length - offset >= CAN_FRAME_WIRE_LEN) {
      frames.push(decodeCanFrame(this.buffered.subarray(offset, offset + CAN_FRAME_WIRE_LEN)));
      offset += CAN_FRAME_WIRE_LEN;
    }
    this.buffered = Buffer.from(this.buffered.subarray(offset));
    return frames;
  }

  /** Discards a trailing partial frame, returning how many bytes were dropped. */
  end() {
    const dropped = this.buffered.length;
    this.buffered = Buffer.alloc(0);
    return dropped;
  }
}
