import { AgentFactory, IAgent } from "./interfaces/IAgent";

/**
 * In-memory registry of agent constructors, keyed by name.
 */
export class AgentRegistry {
  private factories = new Map<string, AgentFactory>();

  register(name: string, factory: AgentFactory): void {
    this.factories.set(name, factory);
  }

  /** Build a fresh agent. Throws if the name is unknown. */
  create(name: string): IAgent {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new Error(
        `Agent '${name}' is not registered. Registered agents: ${this.list().join(", ") || "(none)"}`
      );
    }
    return factory();
  }

  list(): string[] {
    return Array.from(this.factories.keys());
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }
}
