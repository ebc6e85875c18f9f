import type { Logger } from "pino";
import type { Clock } from "../utils/clock";
import { elapsedSince } from "../utils/clock";
import type { ActorHost } from "./ActorHost";

export class PassivationManager {
  private sweeper?: ReturnType<typeof setInterval> | undefined;

  constructor(
    private hosts: Map<string, ActorHost>,
    private onEvict: (id: string) => Promise<void>,
    private idleAfterMs: number,
    sweepIntervalMs: number,
    private clock: Clock,
    private log: Logger,
  ) {
    this.sweeper = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.log.error({ err: error }, "passivation sweep failed");
      });
    }, sweepIntervalMs);
    // `unref` doesn't exist in some environments (e.g., browsers)
    this.sweeper.unref?.();
  }

  private async sweep() {
    const pending: Promise<void>[] = [];
    for (const [id, host] of this.hosts.entries()) {
      if (host.isFailed) continue;
      if (elapsedSince(this.clock, host.lastActivity) > this.idleAfterMs) {
        pending.push(this.onEvict(id));
      }
    }
    // Ensure evictions complete (important for fake-timer tests)
    const results = await Promise.allSettled(pending);
    for (const result of results) {
      if (result.status === "rejected") {
        this.log.warn({ err: result.reason }, "eviction failed");
      }
    }
  }

  stop() {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }
}
