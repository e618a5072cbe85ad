import { randomUUID } from "node:crypto";
import type { Logger } from "./logger.js";
import type { CaptureEvent } from "./types.js";

export interface SubscriberChannel {
  /** May resolve late to signal backpressure; throwing or rejecting drops the subscriber. */
  send(message: string): void | Promise<void>;
  close(): void;
}

export interface SubscriptionHandle {
  readonly id: string;
  readonly endpointId: string;
}

export type OverflowPolicy = "drop-oldest" | "disconnect";

export interface HubOptions {
  logger: Logger;
  bufferSize?: number;
  overflow?: OverflowPolicy;
}

interface Subscriber extends SubscriptionHandle {
  channel: SubscriberChannel;
  queue: string[];
  draining: boolean;
  closed: boolean;
  dropped: number;
}

export class FanoutHub {
  private readonly subscribers = new Map<string, Map<string, Subscriber>>();
  private readonly logger: Logger;
  private readonly bufferSize: number;
  private readonly overflow: OverflowPolicy;

  constructor(options: HubOptions) {
    this.logger = options.logger;
    this.bufferSize = options.bufferSize ?? 100;
    this.overflow = options.overflow ?? "drop-oldest";
  }

  subscribe(endpointId: string, channel: SubscriberChannel): SubscriptionHandle {
    const subscriber: Subscriber = {
      id: randomUUID(),
      endpointId,
      channel,
      queue: [],
      draining: false,
      closed: false,
      dropped: 0,
    };
    const set = this.subscribers.get(endpointId) ?? new Map<string, Subscriber>();
    set.set(subscriber.id, subscriber);
    this.subscribers.set(endpointId, set);
    this.logger.debug({ endpointId, subscriptionId: subscriber.id }, "subscriber joined");
    return { id: subscriber.id, endpointId };
  }

  /** Safe to call more than once. Does not close the channel. */
  unsubscribe(handle: SubscriptionHandle): void {
    const subscriber = this.subscribers.get(handle.endpointId)?.get(handle.id);
    if (subscriber) {
      this.remove(subscriber);
    }
  }

  /** Returns how many subscribers the event was queued for. */
  publish(endpointId: string, event: CaptureEvent): number {
    const set = this.subscribers.get(endpointId);
    if (!set || set.size === 0) return 0;

    const message = JSON.stringify(event);
    let queued = 0;
    for (const subscriber of [...set.values()]) {
      if (this.enqueue(subscriber, message)) {
        queued += 1;
        void this.drain(subscriber);
      }
    }
    return queued;
  }

  subscriberCount(endpointId?: string): number {
    if (endpointId !== undefined) {
      return this.subscribers.get(endpointId)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.subscribers.values()) {
      total += set.size;
    }
    return total;
  }

  closeEndpoint(endpointId: string): void {
    const set = this.subscribers.get(endpointId);
    if (!set) return;
    for (const subscriber of [...set.values()]) {
      this.disconnect(subscriber);
    }
  }

  closeAll(): void {
    for (const endpointId of [...this.subscribers.keys()]) {
      this.closeEndpoint(endpointId);
    }
  }

  private enqueue(subscriber: Subscriber, message: string): boolean {
    if (subscriber.queue.length >= this.bufferSize) {
      if (this.overflow === "disconnect") {
        this.logger.warn(
          { endpointId: subscriber.endpointId, subscriptionId: subscriber.id },
          "subscriber buffer full, disconnecting"
        );
        this.disconnect(subscriber);
        return false;
      }
      subscriber.queue.shift();
      subscriber.dropped += 1;
      this.logger.debug(
        { endpointId: subscriber.endpointId, subscriptionId: subscriber.id, dropped: subscriber.dropped },
        "subscriber buffer full, dropped oldest event"
      );
    }
    subscriber.queue.push(message);
    return true;
  }

  private async drain(subscriber: Subscriber): Promise<void> {
    if (subscriber.draining) return;
    subscriber.draining = true;
    try {
      let message = subscriber.queue.shift();
      while (message !== undefined && !subscriber.closed) {
        await subscriber.channel.send(message);
        message = subscriber.queue.shift();
      }
    } catch (error) {
      this.logger.warn(
        { err: error, endpointId: subscriber.endpointId, subscriptionId: subscriber.id },
        "delivery to subscriber failed, disconnecting"
      );
      this.disconnect(subscriber);
    } finally {
      subscriber.draining = false;
    }
  }

  private disconnect(subscriber: Subscriber): void {
    this.remove(subscriber);
    try {
      subscriber.channel.close();
    } catch (error) {
      this.logger.debug({ err: error, subscriptionId: subscriber.id }, "closing subscriber channel failed");
    }
  }

  private remove(subscriber: Subscriber): void {
    subscriber.closed = true;
    subscriber.queue.length = 0;
    const set = this.subscribers.get(subscriber.endpointId);
    if (!set) return;
    set.delete(subscriber.id);
    if (set.size === 0) {
      this.subscribers.delete(subscriber.endpointId);
    }
  }
}
