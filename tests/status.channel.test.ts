import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { BroadcastChannel, type ChannelEvent } from "../src/status/channel.js";
import { resourceKey } from "../src/status/resourceKey.js";
import { errorState, restarting, running } from "../src/status/state.js";

const KEY = resourceKey("default", "web");

/** Records whether a promise settled without awaiting it. */
function track(promise: Promise<ChannelEvent>): { settled: () => boolean; value: () => ChannelEvent | undefined } {
  let result: ChannelEvent | undefined;
  let done = false;
  void promise.then((event) => {
    result = event;
    done = true;
  });
  return { settled: () => done, value: () => result };
}

describe("broadcast channel delivery", () => {
  it("delivers the cached state as the first event", async () => {
    const channel = new BroadcastChannel(KEY);
    channel.publish(errorState("previous failure"));

    const subscription = channel.subscribe();

    expect(await subscription.next()).to.deep.equal({ type: "state", state: errorState("previous failure") });
    expect(channel.current).to.deep.equal({ tag: "error", message: "previous failure" });
  });

  it("starts every channel in the running state", async () => {
    const channel = new BroadcastChannel(KEY);
    expect(channel.current).to.equal(running());
    expect(await channel.subscribe().next()).to.deep.equal({ type: "state", state: running() });
  });

  it("fans every publish out to every subscriber in order", async () => {
    const channel = new BroadcastChannel(KEY);
    const first = channel.subscribe();
    const second = channel.subscribe();

    channel.publish(restarting());
    channel.publish(running());

    for (const subscription of [first, second]) {
      const tags: string[] = [];
      for (let index = 0; index < 3; index += 1) {
        const event = await channel.nextEvent(subscription);
        expect(event.type).to.equal("state");
        if (event.type === "state") {
          tags.push(event.state.tag);
        }
      }
      expect(tags).to.deep.equal(["running", "restarting", "running"]);
    }
  });

  it("wakes a waiting reader when a state is published", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next();

    const pending = subscription.next();
    channel.publish(restarting());

    expect(await pending).to.deep.equal({ type: "state", state: restarting() });
  });

  it("keeps only the most recent states for a slow subscriber", async () => {
    const channel = new BroadcastChannel(KEY, { maxPending: 3 });
    const subscription = channel.subscribe();
    await subscription.next();

    channel.publish(restarting());
    channel.publish(errorState("first"));
    channel.publish(errorState("second"));
    channel.publish(errorState("third"));

    expect(subscription.pending).to.equal(3);
    expect(await subscription.next()).to.deep.equal({ type: "state", state: errorState("first") });
    expect(await subscription.next()).to.deep.equal({ type: "state", state: errorState("second") });
    expect(await subscription.next()).to.deep.equal({ type: "state", state: errorState("third") });
  });

  it("never drops the subscribe-time state when the queue overflows", async () => {
    const channel = new BroadcastChannel(KEY, { maxPending: 2 });
    channel.publish(errorState("boom"));
    const subscription = channel.subscribe();

    channel.publish(restarting());
    channel.publish(errorState("first"));
    channel.publish(errorState("second"));

    expect(subscription.pending).to.equal(2);
    expect(await subscription.next()).to.deep.equal({ type: "state", state: errorState("boom") });
    expect(await subscription.next()).to.deep.equal({ type: "state", state: errorState("second") });
    expect(channel.current).to.deep.equal(errorState("second"));
  });

  it("delivers the cached state first even after a burst past the default capacity", async () => {
    const channel = new BroadcastChannel(KEY);
    channel.publish(errorState("boom"));
    const subscription = channel.subscribe();
    for (let index = 0; index < 16; index += 1) {
      channel.publish(restarting());
    }

    expect(subscription.pending).to.equal(16);
    expect(await subscription.next()).to.deep.equal({ type: "state", state: errorState("boom") });
    expect(await subscription.next()).to.deep.equal({ type: "state", state: restarting() });
  });

  it("rejects overlapping reads on the same subscription", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next();

    const pending = subscription.next();
    expect(() => subscription.next()).to.throw(Error, /already has a pending read/);

    subscription.close();
    expect(await pending).to.deep.equal({ type: "closed" });
  });

  it("rejects non-positive heartbeat intervals", () => {
    const subscription = new BroadcastChannel(KEY).subscribe();
    expect(() => subscription.next(0)).to.throw(RangeError);
    expect(() => subscription.next(-5)).to.throw(RangeError);
  });
});

describe("broadcast channel teardown", () => {
  it("removes the subscription and reports closed afterwards", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    expect(channel.subscriberCount).to.equal(1);

    channel.unsubscribe(subscription);

    expect(channel.subscriberCount).to.equal(0);
    expect(subscription.closed).to.equal(true);
    expect(await subscription.next()).to.deep.equal({ type: "closed" });
  });

  it("resolves a pending read with closed when the subscription is released", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next();

    const pending = subscription.next(60_000);
    channel.unsubscribe(subscription);

    expect(await pending).to.deep.equal({ type: "closed" });
  });

  it("ignores repeated and foreign unsubscribe calls", () => {
    const channel = new BroadcastChannel(KEY);
    const other = new BroadcastChannel(resourceKey("default", "api"));
    const mine = channel.subscribe();
    const foreign = other.subscribe();

    channel.unsubscribe(foreign);
    expect(channel.subscriberCount).to.equal(1);
    expect(foreign.closed).to.equal(false);

    channel.unsubscribe(mine);
    channel.unsubscribe(mine);
    expect(channel.subscriberCount).to.equal(0);
  });

  it("stops delivering to released subscriptions", () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    subscription.close();

    channel.publish(restarting());

    expect(subscription.pending).to.equal(0);
  });
});

describe("broadcast channel heartbeats", () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers({ now: 0, toFake: ["setTimeout", "clearTimeout", "Date"] });
  });

  afterEach(() => {
    clock.restore();
  });

  it("emits a heartbeat once the interval passes without a delivery", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next(1_000);

    const read = track(subscription.next(1_000));
    await clock.tickAsync(999);
    expect(read.settled()).to.equal(false);

    await clock.tickAsync(1);
    expect(read.value()).to.deep.equal({ type: "heartbeat" });
  });

  it("keeps emitting heartbeats while the channel stays quiet", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    expect(await subscription.next(1_000)).to.deep.equal({ type: "state", state: running() });

    const times: number[] = [];
    for (let beat = 0; beat < 3; beat += 1) {
      const read = track(subscription.next(1_000));
      await clock.tickAsync(1_000);
      expect(read.value()).to.deep.equal({ type: "heartbeat" });
      times.push(Date.now());
    }

    expect(times).to.deep.equal([1_000, 2_000, 3_000]);
    expect(channel.current).to.equal(running());
    expect(clock.countTimers()).to.equal(0);
  });

  it("restarts the heartbeat countdown after every state delivery", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next(1_000);

    const first = track(subscription.next(1_000));
    await clock.tickAsync(500);
    channel.publish(restarting());
    await clock.tickAsync(0);
    expect(first.value()).to.deep.equal({ type: "state", state: restarting() });

    const second = track(subscription.next(1_000));
    await clock.tickAsync(999);
    expect(second.settled()).to.equal(false);
    await clock.tickAsync(1);
    expect(second.value()).to.deep.equal({ type: "heartbeat" });
  });

  it("returns a heartbeat immediately when the consumer fell behind the interval", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next(1_000);

    await clock.tickAsync(5_000);

    expect(await subscription.next(1_000)).to.deep.equal({ type: "heartbeat" });
  });

  it("never emits heartbeats for a plain wait", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next();

    const read = track(subscription.next());
    await clock.tickAsync(120_000);
    expect(read.settled()).to.equal(false);

    channel.publish(running());
    await clock.tickAsync(0);
    expect(read.value()).to.deep.equal({ type: "state", state: running() });
  });

  it("cancels the heartbeat timer when the subscription closes", async () => {
    const channel = new BroadcastChannel(KEY);
    const subscription = channel.subscribe();
    await subscription.next(1_000);

    const read = track(subscription.next(1_000));
    expect(clock.countTimers()).to.equal(1);
    subscription.close();
    await clock.tickAsync(0);

    expect(read.value()).to.deep.equal({ type: "closed" });
    expect(clock.countTimers()).to.equal(0);
  });
});
