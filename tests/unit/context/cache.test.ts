import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { createCapabilityBinder, type CapabilityBinder } from '../../../src/capabilities/binder.js';
import { ExecutionContextCache } from '../../../src/context/cache.js';
import { SqliteStore } from '../../../src/services/store/sqlite.js';
import type { CrewRepository } from '../../../src/services/store/types.js';
import { CrewNotFoundError, EmptyCrewError } from '../../../src/utils/errors.js';
import { FakeTransport, deferred, seedCrew } from '../../helpers/fakes.js';

describe('ExecutionContextCache', () => {
  let store: SqliteStore;
  let binder: Mock<CapabilityBinder>;
  let cache: ExecutionContextCache;

  beforeEach(() => {
    store = new SqliteStore(':memory:');
    binder = vi.fn(createCapabilityBinder(new FakeTransport(), { retryDelaysMs: [], callTimeoutMs: 1000 }));
    cache = new ExecutionContextCache(store, binder);
  });

  afterEach(() => {
    store.close();
  });

  it('returns the identical context while membership is unchanged', async () => {
    const { crew } = await seedCrew(store, [{ name: 'Researcher' }]);

    const first = await cache.get(crew.id);
    const second = await cache.get(crew.id);

    expect(second).toBe(first);
    expect(binder).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, rebuilds: 1, size: 1 });
  });

  it('rebuilds after a membership change without an explicit invalidate', async () => {
    const { crew } = await seedCrew(store, [{ name: 'Researcher' }]);
    const before = await cache.get(crew.id);

    const writer = await store.createAgent({ name: 'Writer', connection: { kind: 'direct_line', botId: 'bot-writer' } });
    const updated = await store.addMember(crew.id, { agentId: writer.id, role: 'author' });
    const after = await cache.get(crew.id);

    expect(after).not.toBe(before);
    expect(after.membershipVersion).toBe(updated.membershipVersion);
    expect(after.describe().map((capability) => capability.name)).toEqual(['ask_researcher', 'ask_writer']);
  });

  it('rebuilds when an agent of the crew is updated', async () => {
    const { crew, agents } = await seedCrew(store, [{ name: 'Researcher' }]);
    await cache.get(crew.id);

    await store.updateAgent(agents[0].id, { name: 'Scout' });
    const after = await cache.get(crew.id);

    expect(after.describe().map((capability) => capability.name)).toEqual(['ask_scout']);
  });

  it('collapses concurrent misses for one crew into a single build', async () => {
    const { crew } = await seedCrew(store, [{ name: 'Researcher' }]);

    const [a, b, c] = await Promise.all([cache.get(crew.id), cache.get(crew.id), cache.get(crew.id)]);

    expect(b).toBe(a);
    expect(c).toBe(a);
    expect(binder).toHaveBeenCalledTimes(1);
  });

  it('rebuilds after invalidate even at the same version', async () => {
    const { crew } = await seedCrew(store, [{ name: 'Researcher' }]);
    const before = await cache.get(crew.id);

    await cache.invalidate(crew.id);
    expect(cache.describe(crew.id)).toEqual([]);
    const after = await cache.get(crew.id);

    expect(after).not.toBe(before);
    expect(after.membershipVersion).toBe(before.membershipVersion);
  });

  it('fails for unknown crews', async () => {
    await expect(cache.get('missing')).rejects.toBeInstanceOf(CrewNotFoundError);
  });

  it('drops the entry when the crew has no active agent left', async () => {
    const { crew, agents } = await seedCrew(store, [{ name: 'Researcher' }]);
    await cache.get(crew.id);

    await store.updateAgent(agents[0].id, { isActive: false });

    await expect(cache.get(crew.id)).rejects.toBeInstanceOf(EmptyCrewError);
    expect(cache.stats().size).toBe(0);
  });

  it('does not make one crew wait for another crew build', async () => {
    const slow = await seedCrew(store, [{ name: 'Researcher' }], 'Slow crew');
    const fast = await seedCrew(store, [{ name: 'Writer' }], 'Fast crew');
    const gate = deferred();

    const repository: CrewRepository = {
      getMembershipVersion: (crewId) => store.getMembershipVersion(crewId),
      getCrewMembership: async (crewId) => {
        if (crewId === slow.crew.id) await gate.promise;
        return store.getCrewMembership(crewId);
      },
    };
    const gated = new ExecutionContextCache(repository, binder);

    const pending = gated.get(slow.crew.id);
    const other = await gated.get(fast.crew.id);

    expect(other.crewId).toBe(fast.crew.id);
    gate.resolve();
    await expect(pending).resolves.toMatchObject({ crewId: slow.crew.id });
  });

  it('hands every run its own copy of the capability set', async () => {
    const { crew } = await seedCrew(store, [{ name: 'Researcher' }]);
    const context = await cache.get(crew.id);

    const runA = context.forRun();
    const runB = context.forRun();

    expect(runA).not.toBe(runB);
    expect(runA.get('ask_researcher')).not.toBe(runB.get('ask_researcher'));
    expect(runA.describe()).toEqual(runB.describe());
  });
});
