import type { AgentCapability, CapabilityDescriptor } from './agent-capability.js';

/**
 * Ordered, read-only mapping from function name to capability.
 */
export class CapabilitySet {
  private readonly byName: ReadonlyMap<string, AgentCapability>;

  constructor(private readonly ordered: readonly AgentCapability[]) {
    this.byName = new Map(ordered.map((capability) => [capability.name, capability]));
  }

  get size(): number {
    return this.ordered.length;
  }

  get(name: string): AgentCapability | undefined {
    return this.byName.get(name);
  }

  list(): readonly AgentCapability[] {
    return this.ordered;
  }

  describe(): CapabilityDescriptor[] {
    return this.ordered.map((capability) => capability.describe());
  }

  /** Fresh session holders, shared metadata. */
  clone(): CapabilitySet {
    return new CapabilitySet(this.ordered.map((capability) => capability.clone()));
  }

  /** Session token per capability name; capabilities never called are omitted. */
  sessions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const capability of this.ordered) {
      if (capability.sessionToken !== undefined) {
        result[capability.name] = capability.sessionToken;
      }
    }
    return result;
  }
}
