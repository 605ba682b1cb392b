import { describe, expect, it } from "vitest";

import { EventBus } from "../event-bus.js";

const warning = (message: string) =>
  ({ type: "warning.raised", payload: { message, recorded_at: "2024-01-02T03:04:05.000Z" } }) as const;

describe("EventBus", () => {
  it("delivers events to subscribers until they unsubscribe", () => {
    const bus = new EventBus();
    const seen: string[] = [];
    const unsubscribe = bus.subscribe("warning.raised", (payload) => {
      seen.push(payload.message);
    });

    bus.emit(warning("first"));
    unsubscribe();
    bus.emit(warning("second"));

    expect(seen).toEqual(["first"]);
  });

  it("routes safe-subscriber failures to the error handler", () => {
    const bus = new EventBus();
    const errors: unknown[] = [];
    bus.subscribeSafe(
      "warning.raised",
      () => {
        throw new Error("handler broke");
      },
      (error) => errors.push(error)
    );

    expect(() => bus.emit(warning("x"))).not.toThrow();
    expect(errors).toHaveLength(1);
  });

  it("waits for async handlers on flush and reports their failures", async () => {
    const bus = new EventBus();
    let done = false;
    bus.subscribe("warning.raised", async () => {
      await Promise.resolve();
      done = true;
    });
    bus.subscribe("warning.raised", async () => {
      throw new Error("async failure");
    });

    bus.emit(warning("x"));
    await expect(bus.flush()).rejects.toThrow("EventBus async handlers failed");
    expect(done).toBe(true);
  });
});
