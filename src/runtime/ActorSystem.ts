import { type ResolvedConfig, resolveConfig } from "../config";
import { HostShutdownError } from "../errors";
import { createModuleLogger } from "../logging/logger";
import type { ActorSystemConfig, AnyActorDefinition } from "../types/public";
import { ActorHost } from "./ActorHost";
import { PassivationManager } from "./Passivation";

export class RuntimeActorSystem<TDef extends AnyActorDefinition> {
  private hosts = new Map<string, ActorHost>();
  private passivation?: PassivationManager;
  private readonly config: ResolvedConfig<TDef>;
  private readonly log = createModuleLogger("system");
  public isShutdown = false;

  constructor(config: ActorSystemConfig<TDef>) {
    this.config = resolveConfig(config);
    if (this.config.passivation) {
      this.passivation = new PassivationManager(
        this.hosts,
        this.evictHost,
        this.config.passivation.idleAfter,
        this.config.passivation.sweepInterval,
        this.config.clock,
        this.log,
      );
    }
  }

  getHost(id: string): ActorHost {
    if (this.isShutdown) {
      throw new HostShutdownError(
        "ActorSystem is shut down. Cannot create new actors.",
      );
    }
    let host = this.hosts.get(id);
    if (!host || host.isFailed || host.isShutdown) {
      host = new ActorHost(
        id,
        this.config.definition,
        this.config.store,
        this.config.supervisor,
        this.config.metrics,
        this.config.clock,
      );
      this.hosts.set(id, host);
    }
    return host;
  }

  removeHost(id: string, host: ActorHost) {
    if (this.hosts.get(id) === host) this.hosts.delete(id);
  }

  private evictHost = async (id: string) => {
    const host = this.hosts.get(id);
    if (host) {
      try {
        await host.deactivate();
      } finally {
        this.removeHost(id, host);
      }
      this.log.debug({ actor: id }, "actor evicted");
      this.config.metrics?.onEvict?.(id);
    }
  };

  async terminate() {
    this.isShutdown = true;
    this.passivation?.stop();
    const results = await Promise.allSettled(
      [...this.hosts.values()].map((h) => h.deactivate()),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        this.log.warn({ err: result.reason }, "actor failed to deactivate");
      }
    }
    this.hosts.clear();
  }
}
