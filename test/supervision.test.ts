import { describe, expect, it, vi } from "vitest";
import {
  CommitError,
  create,
  Done,
  define,
  InMemoryBehaviorStore,
  ResetError,
  StoppedActorError,
  type Supervisor,
  supervisor,
} from "@/index";
import { makeDoor } from "./utils/door";

describe("Supervision Strategies", () => {
  it("should 'resume', keeping the behavior and throwing to the caller", async () => {
    const sup: Supervisor = {
      strategy: vi.fn().mockReturnValue("resume"),
    };
    const system = create({ definition: makeDoor([]), supervisor: sup });
    const door = system.get("resume-door");
    await door.tell("open");

    await expect(door.tell("fail")).rejects.toThrow("hinge broke");
    expect(sup.strategy).toHaveBeenCalledWith(
      "open",
      expect.objectContaining({ message: "hinge broke" }),
    );

    expect((await door.inspect()).current).toBe("open");
    await expect(door.tell("close")).resolves.toBe("closed");
    await system.stop();
  });

  it("should 'reset' the actor to its initial state", async () => {
    const events: string[] = [];
    const store = new InMemoryBehaviorStore();
    const system = create({
      definition: makeDoor(events),
      store,
      supervisor: supervisor({ reset: true }),
    });
    const door = system.get("reset-door");
    await door.tell("open");

    const error = await door.tell("fail").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ResetError);
    expect(error).toHaveProperty("message", "Actor reset after error: hinge broke");
    expect(await store.load("reset-door")).toBeNull();

    const snapshot = await door.inspect();
    expect(snapshot).toMatchObject({ current: "closed", stack: [] });
    expect(await store.load("reset-door")).toEqual(snapshot);
    expect(events.filter((e) => e === "closed:Activate")).toHaveLength(2);
    await system.stop();
  });

  it("should 'stop' the actor, rejecting everything after the failing call", async () => {
    const system = create({
      definition: makeDoor([]),
      supervisor: supervisor({ stop: (current) => current === "open" }),
    });
    const door = system.get("stop-door");
    await door.tell("open");

    await expect(door.tell("fail")).rejects.toThrow("hinge broke");
    await expect(door.tell("close")).rejects.toThrowError(
      new StoppedActorError("stop-door"),
    );
    await expect(door.inspect()).rejects.toThrow(
      "Actor stop-door is stopped. Further messages are rejected.",
    );

    const fresh = system.get("stop-door");
    expect(fresh).not.toBe(door);
    expect((await fresh.inspect()).current).toBe("closed");
    await expect(fresh.tell("open")).resolves.toBe("opened");
    await system.stop();
  });

  it("reports handler errors to metrics", async () => {
    const onError = vi.fn();
    const system = create({ definition: makeDoor([]), metrics: { onError } });
    const door = system.get("door-1");
    await door.tell("open");

    await expect(door.tell("fail")).rejects.toThrow("hinge broke");
    expect(onError).toHaveBeenCalledWith(
      "door-1",
      expect.objectContaining({ message: "hinge broke" }),
    );
    await system.stop();
  });
});

describe("Supervision decisions", () => {
  it("decide on the state the failing turn ended in", async () => {
    const Flaky = define("Flaky")
      .state("idle", async (message, ctx) => {
        if (message === "start") {
          await ctx.become("running");
          throw new Error("crashed after start");
        }
        return Done;
      })
      .state("running", async () => Done)
      .initial("idle")
      .build();
    const strategy = vi.fn<Supervisor["strategy"]>().mockReturnValue("resume");
    const system = create({ definition: Flaky, supervisor: { strategy } });
    const actor = system.get("flaky-1");

    await expect(actor.tell("start")).rejects.toThrow("crashed after start");
    expect(strategy).toHaveBeenCalledOnce();
    expect(strategy.mock.calls[0]?.[0]).toBe("running");
    expect((await actor.inspect()).current).toBe("running");
    await system.stop();
  });

  it("leave commit failures to the host, never resetting the store", async () => {
    const store = new InMemoryBehaviorStore();
    const strategy = vi.fn<Supervisor["strategy"]>().mockReturnValue("reset");
    const system = create({
      definition: makeDoor([]),
      store,
      supervisor: { strategy },
    });
    const door = system.get("door-1");
    await door.tell("open");
    const { etag } = await door.inspect();
    await store.save(
      "door-1",
      { current: "closed", stack: [], etag: "external" },
      etag,
    );

    await expect(door.tell("close")).rejects.toBeInstanceOf(CommitError);
    expect(strategy).not.toHaveBeenCalled();
    expect(await store.load("door-1")).toEqual({
      current: "closed",
      stack: [],
      etag: "external",
    });
    await system.stop();
  });
});

describe("supervisor()", () => {
  const error = new Error("x");

  it("applies stop, then reset, then resume", () => {
    const sup = supervisor({ resume: true, reset: true, stop: true });
    expect(sup.strategy("a", error)).toBe("stop");
    expect(supervisor({ resume: true, reset: true }).strategy("a", error)).toBe(
      "reset",
    );
  });

  it("falls back to the default, or resume", () => {
    expect(supervisor({}).strategy(null, error)).toBe("resume");
    expect(supervisor({ stop: false, default: "reset" }).strategy(null, error)).toBe(
      "reset",
    );
  });

  it("matches rules given as state names", () => {
    const sup = supervisor({ stop: ["closing"], reset: ["open", "locked"] });
    expect(sup.strategy("closing", error)).toBe("stop");
    expect(sup.strategy("locked", error)).toBe("reset");
    expect(sup.strategy("closed", error)).toBe("resume");
    expect(sup.strategy(null, error)).toBe("resume");
  });

  it("passes the current state to guards", () => {
    const stop = vi.fn().mockReturnValue(false);
    supervisor({ stop }).strategy("open", error);
    expect(stop).toHaveBeenCalledWith("open", error);
  });
});
