import { AsyncQueue } from "@ecu-sim/shared";
import type { CanFrame } from "../can";
import type { FrameHandler, FrameLink } from "./types";

const copyFrame = (frame: CanFrame): CanFrame => ({
  arbitrationId: frame.arbitrationId,
  data: Buffer.from(frame.data),
});

/**
 * In-process software bus. A frame sent by one endpoint reaches every other
 * attached endpoint, never the sender.
 */
export class VirtualBus {
  private endpoints = new Set<BusEndpoint>();

  constructor(readonly channel = "vcan0") {}

  get endpointCount() {
    return this.endpoints.size;
  }

  attach(name = `endpoint-${this.endpoints.size + 1}`) {
    const endpoint = new BusEndpoint(this, name);
    this.endpoints.add(endpoint);
    return endpoint;
  }

  /** @internal */
  detach(endpoint: BusEndpoint) {
    this.endpoints.delete(endpoint);
  }

  /** @internal */
  deliver(from: BusEndpoint, frame: CanFrame) {
    for (const endpoint of Array.from(this.endpoints)) {
      if (endpoint !== from) {
        endpoint.accept(copyFrame(frame));
      }
    }
  }
}

/**
 * Frames are handed to `onFrame` listeners when any are registered and
 * queued for `receive` otherwise.
 */
export class BusEndpoint implements FrameLink {
  private inbox = new AsyncQueue<CanFrame>();
  private listeners = new Set<FrameHandler>();
  private closed = false;

  constructor(
    private readonly bus: VirtualBus,
    readonly name: string
  ) {}

  get pending() {
    return this.inbox.size;
  }

  async send(frame: CanFrame) {
    if (this.closed) {
      throw new Error(`Bus endpoint ${this.name} is closed.`);
    }
    this.bus.deliver(this, frame);
  }

  receive(timeoutMs: number) {
    return this.inbox.receive(timeoutMs);
  }

  onFrame(handler: FrameHandler) {
    this.listeners.add(handler);
    return () => {
      this.listeners.delete(handler);
    };
  }

  /** @internal */
  accept(frame: CanFrame) {
    if (this.closed) {
      return;
    }
    if (this.listeners.size > 0) {
      this.listeners.forEach((handler) => handler(frame));
      return;
    }
    this.inbox.push(frame);
  }

  close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.listeners.clear();
    this.inbox.close();
    this.bus.detach(this);
  }
}
