/**
 * ZeroMQ Message Bus
 *
 * Every process connects one PUB socket to the broker's XSUB side and one SUB
 * socket to its XPUB side. The broker (startBusBroker) forwards messages and
 * subscriptions between the two, so any process can reach a channel without
 * knowing who serves it.
 */

import * as zmq from "zeromq";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { createChannelRouter, type MessageBus } from "./bus.js";
import { DEFAULT_BUS_PUBLISH_ADDRESS, DEFAULT_BUS_SUBSCRIBE_ADDRESS } from "./protocol.js";

const log = createSubsystemLogger("egress-handler/zmq-bus");

export type ZmqBusConfig = {
  /** Broker XSUB address (publishers connect here) */
  publishAddress?: string;
  /** Broker XPUB address (subscribers connect here) */
  subscribeAddress?: string;
};

export type BusBroker = {
  stop(): Promise<void>;
};

export async function startBusBroker(userConfig?: ZmqBusConfig): Promise<BusBroker> {
  const publishAddress = userConfig?.publishAddress ?? DEFAULT_BUS_PUBLISH_ADDRESS;
  const subscribeAddress = userConfig?.subscribeAddress ?? DEFAULT_BUS_SUBSCRIBE_ADDRESS;

  const frontend = new zmq.XSubscriber();
  const backend = new zmq.XPublisher();
  try {
    await frontend.bind(publishAddress);
    await backend.bind(subscribeAddress);
  } catch (err) {
    frontend.close();
    backend.close();
    throw err;
  }

  const proxy = new zmq.Proxy(frontend, backend);
  const running = proxy.run().catch((err: unknown) => {
    log.error(`Bus broker stopped: ${String(err)}`);
  });
  log.info(`Bus broker listening`, { publishAddress, subscribeAddress });

  return {
    async stop() {
      proxy.terminate();
      await running;
      if (!frontend.closed) {
        frontend.close();
      }
      if (!backend.closed) {
        backend.close();
      }
    },
  };
}

export function createZmqMessageBus(userConfig?: ZmqBusConfig): MessageBus {
  const config: Required<ZmqBusConfig> = {
    publishAddress: userConfig?.publishAddress ?? DEFAULT_BUS_PUBLISH_ADDRESS,
    subscribeAddress: userConfig?.subscribeAddress ?? DEFAULT_BUS_SUBSCRIBE_ADDRESS,
  };

  const router = createChannelRouter();
  const publisher = new zmq.Publisher();
  const subscriber = new zmq.Subscriber();
  publisher.connect(config.publishAddress);
  subscriber.connect(config.subscribeAddress);

  let closed = false;

  // Queue for serializing sends (a zmq socket accepts one send at a time)
  let sendQueue: Promise<void> = Promise.resolve();

  async function runReceiveLoop() {
    try {
      for await (const [topic, msg] of subscriber) {
        if (!topic || !msg) {
          continue;
        }
        void router.dispatch(topic.toString(), msg.toString());
      }
    } catch (err) {
      if (!closed) {
        log.error(`Bus receive loop failed: ${String(err)}`);
      }
    }
  }

  void runReceiveLoop();

  return {
    publish(channel, message) {
      if (closed) {
        return Promise.reject(new Error("Message bus closed"));
      }
      const sent = sendQueue.then(async () => {
        await publisher.send([channel, message]);
      });
      // Keep the queue alive after a failed send; the caller still sees the error
      sendQueue = sent.catch((err: unknown) => {
        log.warn(`Failed to publish on ${channel}: ${String(err)}`);
      });
      return sent;
    },

    async subscribe(channel, handler) {
      if (closed) {
        throw new Error("Message bus closed");
      }
      if (router.add(channel, handler)) {
        subscriber.subscribe(channel);
      }
      return {
        channel,
        async close() {
          if (router.remove(channel, handler) && !closed) {
            subscriber.unsubscribe(channel);
          }
        },
      };
    },

    async close() {
      if (closed) {
        return;
      }
      closed = true;
      await sendQueue;
      router.clear();
      publisher.close();
      subscriber.close();
    },
  };
}
