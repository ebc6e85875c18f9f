import { define, Done, isSignal, Unhandled } from "@/index";

/**
 * closed --open--> open --close--> closed
 * closed --lock--> locked (stacked) --unlock--> closed
 */
export function makeDoor(events: string[]) {
  return define("Door")
    .state("closed", async (message, ctx) => {
      if (isSignal(message)) {
        events.push(`closed:${message.kind}`);
        return Done;
      }
      if (message === "open") {
        await ctx.become("open");
        return "opened";
      }
      if (message === "lock") {
        await ctx.becomeStacked("locked", "key-1");
        return "locked";
      }
      return Unhandled;
    })
    .state("open", async (message, ctx) => {
      if (isSignal(message)) {
        events.push(`open:${message.kind}`);
        return Done;
      }
      if (message === "close") {
        await ctx.become("closed");
        return "closed";
      }
      if (message === "fail") {
        throw new Error("hinge broke");
      }
      return Unhandled;
    })
    .state("locked", async (message, ctx) => {
      if (isSignal(message)) {
        events.push(`locked:${message.kind}`);
        return Done;
      }
      if (message === "unlock") {
        await ctx.unbecome();
        return "unlocked";
      }
      return Unhandled;
    })
    .initial("closed")
    .build();
}
