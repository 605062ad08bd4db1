import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { MessageBus } from "./bus.js";
import { createZmqMessageBus, startBusBroker, type BusBroker } from "./zmq-bus.js";

describe("zmq message bus", () => {
  let broker: BusBroker | null = null;
  const buses: MessageBus[] = [];

  let testPublishAddr = "";
  let testSubscribeAddr = "";
  let run = 0;

  beforeEach(async () => {
    run++;
    testPublishAddr = `inproc://egress-bus-test-pub-${run}`;
    testSubscribeAddr = `inproc://egress-bus-test-sub-${run}`;
    broker = await startBusBroker({
      publishAddress: testPublishAddr,
      subscribeAddress: testSubscribeAddr,
    });
  });

  afterEach(async () => {
    for (const bus of buses.splice(0)) {
      await bus.close();
    }
    if (broker) {
      await broker.stop();
      broker = null;
    }
  });

  function connect(): MessageBus {
    const bus = createZmqMessageBus({
      publishAddress: testPublishAddr,
      subscribeAddress: testSubscribeAddr,
    });
    buses.push(bus);
    return bus;
  }

  // Subscriptions reach the broker asynchronously, so keep publishing until
  // the first message lands
  async function publishUntil(
    bus: MessageBus,
    channel: string,
    message: string,
    done: () => boolean,
  ) {
    for (let attempt = 0; attempt < 100 && !done(); attempt++) {
      await bus.publish(channel, message);
      await new Promise((r) => setTimeout(r, 20));
    }
  }

  it("routes messages between processes through the broker", async () => {
    const server = connect();
    const client = connect();
    const received: string[] = [];
    await server.subscribe("rpc|EgressHandler|StopEgress|EG_1", (msg) => {
      received.push(msg);
    });

    await publishUntil(
      client,
      "rpc|EgressHandler|StopEgress|EG_1",
      "stop",
      () => received.length > 0,
    );

    expect(received[0]).toBe("stop");
  });

  it("does not deliver channels that only share a prefix", async () => {
    const bus = connect();
    const exact: string[] = [];
    const prefixed: string[] = [];
    await bus.subscribe("topic|EG_1", (msg) => {
      exact.push(msg);
    });
    await bus.subscribe("topic|EG_10", (msg) => {
      prefixed.push(msg);
    });

    await publishUntil(bus, "topic|EG_10", "ten", () => prefixed.length > 0);

    expect(prefixed[0]).toBe("ten");
    expect(exact).toEqual([]);
  });

  it("rejects publishing after close", async () => {
    const bus = connect();
    await bus.close();
    await expect(bus.publish("ch", "msg")).rejects.toThrow("Message bus closed");
  });
});
