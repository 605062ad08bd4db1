/**
 * Message Bus
 *
 * Channel-addressed publish/subscribe shared by every handler process. The RPC
 * layer is built on top of this; the transport only moves strings.
 */

import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("egress-handler/bus");

export type MessageHandler = (message: string) => void | Promise<void>;

export type Subscription = {
  channel: string;
  close(): Promise<void>;
};

export interface MessageBus {
  publish(channel: string, message: string): Promise<void>;
  /** Handlers only see messages whose channel equals `channel` exactly */
  subscribe(channel: string, handler: MessageHandler): Promise<Subscription>;
  close(): Promise<void>;
}

/**
 * Dispatch table shared by bus implementations: channel -> handlers.
 */
export function createChannelRouter() {
  const handlers = new Map<string, Set<MessageHandler>>();

  async function invoke(channel: string, handler: MessageHandler, message: string) {
    try {
      await handler(message);
    } catch (err) {
      log.warn(`Subscriber on ${channel} failed: ${String(err)}`);
    }
  }

  return {
    /** Returns true when this is the first handler for the channel */
    add(channel: string, handler: MessageHandler): boolean {
      let set = handlers.get(channel);
      const first = !set;
      if (!set) {
        set = new Set();
        handlers.set(channel, set);
      }
      set.add(handler);
      return first;
    },
    /** Returns true when the channel has no handlers left */
    remove(channel: string, handler: MessageHandler): boolean {
      const set = handlers.get(channel);
      if (!set) {
        return false;
      }
      set.delete(handler);
      if (set.size === 0) {
        handlers.delete(channel);
        return true;
      }
      return false;
    },
    dispatch(channel: string, message: string): Promise<void> {
      const set = handlers.get(channel);
      if (!set) {
        return Promise.resolve();
      }
      const pending: Promise<void>[] = [];
      for (const handler of [...set]) {
        pending.push(invoke(channel, handler, message));
      }
      return Promise.all(pending).then(() => undefined);
    },
    clear() {
      handlers.clear();
    },
  };
}

/**
 * In-process bus. Delivery is asynchronous so a publisher never runs
 * subscriber code on its own stack.
 */
export function createLocalMessageBus(): MessageBus {
  const router = createChannelRouter();
  let closed = false;

  return {
    async publish(channel, message) {
      if (closed) {
        throw new Error("Message bus closed");
      }
      await Promise.resolve();
      void router.dispatch(channel, message);
    },

    async subscribe(channel, handler) {
      if (closed) {
        throw new Error("Message bus closed");
      }
      router.add(channel, handler);
      return {
        channel,
        async close() {
          router.remove(channel, handler);
        },
      };
    },

    async close() {
      closed = true;
      router.clear();
    },
  };
}
