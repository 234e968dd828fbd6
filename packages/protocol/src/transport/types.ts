import type { CanFrame } from "../can";

export type FrameHandler = (frame: CanFrame) => void;

/** Bidirectional access to a CAN bus, local or bridged. */
export type FrameLink = {
  send: (frame: CanFrame) => Promise<void>;
  onFrame: (handler: FrameHandler) => () => void;
  close: () => void;
};
