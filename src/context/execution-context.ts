import type { CapabilitySet } from '../capabilities/capability-set.js';
import type { CapabilityDescriptor } from '../capabilities/agent-capability.js';

/**
 * A crew's capability set as bound at one membership version.
 *
 * The cached set is a template: runs call forRun() and never invoke the
 * template's capabilities directly.
 */
export class ExecutionContext {
  constructor(
    readonly crewId: string,
    readonly membershipVersion: number,
    private readonly capabilities: CapabilitySet,
    readonly builtAt: number = Date.now()
  ) {
    Object.freeze(this);
  }

  describe(): CapabilityDescriptor[] {
    return this.capabilities.describe();
  }

  get size(): number {
    return this.capabilities.size;
  }

  /** A private copy of the capability set with empty session holders. */
  forRun(): CapabilitySet {
    return this.capabilities.clone();
  }
}
