import { HostShutdownError } from "../errors";
import type { ActorHost } from "../runtime/ActorHost";
import { RuntimeActorSystem } from "../runtime/ActorSystem";
import type {
  ActorRef,
  ActorSystem,
  ActorSystemConfig,
  AnyActorDefinition,
} from "../types/public";

export function create<TDef extends AnyActorDefinition>(
  config: ActorSystemConfig<TDef>,
): ActorSystem {
  const system = new RuntimeActorSystem(config);
  const refs = new Map<string, { ref: ActorRef; host: () => ActorHost }>();

  function ensureRunning() {
    if (system.isShutdown) {
      throw new HostShutdownError(
        "ActorSystem is shut down. Cannot interact with actors.",
      );
    }
  }

  return {
    get(id: string): ActorRef {
      ensureRunning();
      const existing = refs.get(id);
      if (existing && !existing.host().isFailed) {
        return existing.ref;
      }

      let host = system.getHost(id);

      // Deactivated (passivated) hosts are replaced transparently; failed
      // ones keep rejecting until the caller asks for a fresh ref.
      const live = (): ActorHost => {
        ensureRunning();
        if (host.isShutdown) {
          host = system.getHost(id);
        }
        return host;
      };

      const ref: ActorRef = {
        id,
        tell: async (message: unknown) => live().tell(message),
        inspect: async () => live().inspect(),
        stop: async () => {
          await host.deactivate();
          system.removeHost(id, host);
          refs.delete(id);
        },
      };

      const entry = { ref, host: () => host };
      refs.set(id, entry);
      return entry.ref;
    },

    stop: async () => {
      refs.clear();
      await system.terminate();
    },
  };
}
