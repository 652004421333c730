/**
 * pagewise - State Publisher Tests
 * Change events, then the snapshot of the state they changed
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createPublisher } from "../../src/events";

type CounterEvents = {
  "count:change": { count: number; previous: number };
  "error:change": { error: string | undefined };
};

interface CounterState {
  count: number;
  error: string | undefined;
}

/** A tiny observable counter, published the way paginated results are */
const createCounter = (onSnapshot?: (state: CounterState) => void) => {
  const state: CounterState = { count: 0, error: undefined };
  const publisher = createPublisher<CounterEvents, CounterState>({
    snapshot: () => ({ ...state }),
    onSnapshot,
  });

  const setCount = (count: number): void => {
    const previous = state.count;
    state.count = count;
    publisher.publish("count:change", { count, previous });
  };

  const setError = (error: string | undefined): void => {
    state.error = error;
    publisher.publish("error:change", { error });
  };

  return { publisher, setCount, setError };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createPublisher", () => {
  describe("publish", () => {
    it("should deliver the payload to the listeners of the event only", () => {
      const { publisher, setCount } = createCounter();
      const onCount = vi.fn();
      const onError = vi.fn();
      publisher.on("count:change", onCount);
      publisher.on("error:change", onError);

      setCount(3);

      expect(onCount).toHaveBeenCalledWith({ count: 3, previous: 0 });
      expect(onError).not.toHaveBeenCalled();
    });

    it("should hand a snapshot after the listeners of each event", () => {
      const calls: string[] = [];
      const { publisher, setCount, setError } = createCounter((state) => {
        calls.push(`snapshot ${state.count} ${state.error ?? "-"}`);
      });
      publisher.on("count:change", ({ count }) => calls.push(`count ${count}`));

      setCount(1);
      setError("offline");
      setCount(2);

      expect(calls).toEqual([
        "count 1",
        "snapshot 1 -",
        "snapshot 1 offline",
        "count 2",
        "snapshot 2 offline",
      ]);
    });

    it("should let listeners read the updated state", () => {
      const { publisher, setCount } = createCounter();
      const seen: number[] = [];
      publisher.on("count:change", ({ previous }) => seen.push(previous));

      setCount(4);
      setCount(9);

      expect(seen).toEqual([0, 4]);
    });
  });

  describe("listener failures", () => {
    it("should log a throwing listener and still deliver the snapshot", () => {
      const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
      const onSnapshot = vi.fn();
      const { publisher, setCount } = createCounter(onSnapshot);
      const failure = new Error("listener failed");
      const after = vi.fn();

      publisher.on("count:change", () => {
        throw failure;
      });
      publisher.on("count:change", after);
      setCount(1);

      expect(after).toHaveBeenCalledTimes(1);
      expect(onSnapshot).toHaveBeenCalledWith({ count: 1, error: undefined });
      expect(consoleError).toHaveBeenCalledWith(
        '[pagewise] Error in "count:change" listener:',
        failure,
      );
    });

    it("should route failures to onListenerError when given", () => {
      const onListenerError = vi.fn();
      const publisher = createPublisher<CounterEvents, number>({
        snapshot: () => 0,
        onListenerError,
      });
      const failure = new Error("listener failed");
      publisher.on("error:change", () => {
        throw failure;
      });

      publisher.publish("error:change", { error: "offline" });

      expect(onListenerError).toHaveBeenCalledWith(failure, "error:change");
    });
  });

  describe("subscriptions", () => {
    it("should stop delivering after unsubscribe or off", () => {
      const { publisher, setCount } = createCounter();
      const a = vi.fn();
      const b = vi.fn();

      const unsubscribe = publisher.on("count:change", a);
      publisher.on("count:change", b);
      setCount(1);
      unsubscribe();
      publisher.off("count:change", b);
      setCount(2);

      expect(a).toHaveBeenCalledTimes(1);
      expect(b).toHaveBeenCalledTimes(1);
    });

    it("should deliver once to a once listener", () => {
      const { publisher, setCount } = createCounter();
      const handler = vi.fn();

      publisher.once("count:change", handler);
      setCount(1);
      setCount(2);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith({ count: 1, previous: 0 });
    });

    it("should deliver the current event to a listener removed during it", () => {
      const { publisher, setCount } = createCounter();
      const second = vi.fn();
      let unsubscribeSecond = (): void => undefined;

      publisher.on("count:change", () => unsubscribeSecond());
      unsubscribeSecond = publisher.on("count:change", second);
      setCount(1);
      setCount(2);

      expect(second).toHaveBeenCalledTimes(1);
    });

    it("should keep publishing snapshots once the listeners are cleared", () => {
      const onSnapshot = vi.fn();
      const { publisher, setCount } = createCounter(onSnapshot);
      const handler = vi.fn();

      publisher.on("count:change", handler);
      publisher.clear();
      setCount(5);

      expect(handler).not.toHaveBeenCalled();
      expect(onSnapshot).toHaveBeenCalledWith({ count: 5, error: undefined });
    });
  });
});
