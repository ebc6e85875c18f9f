import { describe, expect, it } from "vitest";
import {
  Behavior,
  ConfigurationError,
  Done,
  InvalidOperationError,
  type Receive,
} from "@/index";
import { BehaviorTester } from "./utils/behavior-tester";

describe("Behavior snapshots", () => {
  const tester = (events: string[] = []) =>
    new BehaviorTester(events).state("Initial").state("A").state("B");

  it("captures current state, stack and etag", async () => {
    const { behavior } = tester().initial("Initial");

    await behavior.becomeStacked("A");
    await behavior.becomeStacked("B");

    expect(behavior.snapshot()).toEqual({
      current: "B",
      stack: ["Initial", "A"],
      etag: behavior.etag,
    });
  });

  it("fails to snapshot before initial", () => {
    expect(() => new Behavior().snapshot()).toThrowError(
      "Initial behavior should be set before calling snapshot",
    );
  });

  it("restores silently and keeps the stored etag", async () => {
    const { behavior: source } = tester().initial("Initial");
    await source.becomeStacked("A");
    await source.becomeStacked("B");
    const snapshot = source.snapshot();

    const events: string[] = [];
    const { behavior } = tester(events);
    behavior.restore(snapshot);

    expect(behavior.current?.name).toBe("B");
    expect(behavior.stack).toEqual(["Initial", "A"]);
    expect(behavior.etag).toBe(snapshot.etag);
    expect(events).toEqual([]);

    await behavior.unbecome();
    expect(behavior.current?.name).toBe("A");
    expect(events).toEqual([
      "OnDeactivate_B",
      "OnUnbecome_B",
      "OnBecome_A",
      "OnActivate_A",
    ]);
  });

  it("rejects a snapshot naming an unregistered state", () => {
    const { behavior } = tester();

    expect(() =>
      behavior.restore({ current: "A", stack: ["Gone"], etag: "e-1" }),
    ).toThrowError(new ConfigurationError('State "Gone" is not registered'));
    expect(behavior.current).toBeNull();
    expect(behavior.stack).toEqual([]);
  });

  it("rejects restore once initial is set", () => {
    const { behavior } = tester().initial("Initial");

    expect(() =>
      behavior.restore({ current: "A", stack: [], etag: "e-1" }),
    ).toThrowError(InvalidOperationError);
  });

  it("hands out a copy of the stack", async () => {
    const { behavior } = tester().initial("Initial");
    await behavior.becomeStacked("A");

    const stack = behavior.stack;
    expect(stack).toEqual(["Initial"]);
    await behavior.unbecome();
    expect(stack).toEqual(["Initial"]);
    expect(behavior.stack).toEqual([]);
  });
});

describe("Behavior registry", () => {
  it("rejects registering a name twice", () => {
    const behavior = new Behavior().registerState("A", async () => Done);

    expect(() => behavior.registerState("A", async () => Done)).toThrowError(
      new ConfigurationError('State "A" is already registered'),
    );
  });

  it("names an anonymous initial state after its function", () => {
    const idle: Receive = async () => Done;
    const behavior = new Behavior();

    behavior.initial(idle);

    expect(behavior.current?.name).toBe("idle");
    expect(behavior.current?.receive).toBe(idle);
  });

  it("registers inline handlers under generated names and reuses them", async () => {
    const inline: Receive = [async () => Done][0];
    const behavior = new Behavior().registerState("Initial", async () => Done);
    behavior.initial("Initial");

    await behavior.becomeStacked(async () => "first");
    expect(behavior.current?.name).toBe("anonymous#1");
    await behavior.unbecome();

    await behavior.become(inline);
    expect(behavior.current?.name).toBe("anonymous#2");
    await behavior.become("Initial");
    await behavior.become(inline);
    expect(behavior.current?.name).toBe("anonymous#2");
  });

  it("switches to a registered state when given its handler", async () => {
    const a: Receive = async () => Done;
    const behavior = new Behavior()
      .registerState("Initial", async () => Done)
      .registerState("Alpha", a);
    behavior.initial("Initial");

    await behavior.become(a);

    expect(behavior.current?.name).toBe("Alpha");
  });
});
