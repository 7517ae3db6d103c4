/**
 * @fileoverview Per-crew execution context cache.
 *
 * Read-through, write-invalidate. Every get() compares the stored
 * membership version against the repository, so a missed invalidation
 * costs one rebuild and never serves a stale capability set.
 */

import { CrewNotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { CapabilityBinder } from '../capabilities/binder.js';
import type { CapabilityDescriptor } from '../capabilities/agent-capability.js';
import type { CrewRepository } from '../services/store/types.js';
import { ExecutionContext } from './execution-context.js';
import { KeyedLock } from './lock.js';

const logger = createLogger({ domain: 'context-cache' });

export interface CacheStats {
  hits: number;
  misses: number;
  rebuilds: number;
  size: number;
}

export class ExecutionContextCache {
  private readonly entries = new Map<string, ExecutionContext>();
  private readonly lock = new KeyedLock();
  private hits = 0;
  private misses = 0;
  private rebuilds = 0;

  constructor(
    private readonly repository: CrewRepository,
    private readonly bind: CapabilityBinder
  ) {}

  /**
   * Return the context for the crew's current membership version, building
   * it when absent or stale. Concurrent misses on one crew share one build.
   */
  async get(crewId: string): Promise<ExecutionContext> {
    return this.lock.run(crewId, async () => {
      const version = await this.repository.getMembershipVersion(crewId);
      if (version === null) {
        this.entries.delete(crewId);
        throw new CrewNotFoundError(crewId);
      }

      const cached = this.entries.get(crewId);
      if (cached && cached.membershipVersion === version) {
        this.hits++;
        return cached;
      }

      this.misses++;
      return this.rebuild(crewId, cached?.membershipVersion);
    });
  }

  async invalidate(crewId: string): Promise<void> {
    await this.lock.run(crewId, async () => {
      if (this.entries.delete(crewId)) {
        logger.info('context_invalidated', { crewId });
      }
    });
  }

  /** Capability descriptors of the cached context, or [] when none is cached. */
  describe(crewId: string): CapabilityDescriptor[] {
    return this.entries.get(crewId)?.describe() ?? [];
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      rebuilds: this.rebuilds,
      size: this.entries.size,
    };
  }

  private async rebuild(crewId: string, staleVersion: number | undefined): Promise<ExecutionContext> {
    // Drop the old entry first so a failed build never leaves it behind.
    this.entries.delete(crewId);

    const membership = await this.repository.getCrewMembership(crewId);
    if (!membership) {
      throw new CrewNotFoundError(crewId);
    }

    const context = new ExecutionContext(
      crewId,
      membership.crew.membershipVersion,
      this.bind(crewId, membership.members)
    );
    this.entries.set(crewId, context);
    this.rebuilds++;

    logger.info('context_built', {
      crewId,
      membershipVersion: context.membershipVersion,
      staleVersion,
      capabilities: context.size,
    });
    return context;
  }
}
