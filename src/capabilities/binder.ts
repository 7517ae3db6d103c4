/**
 * @fileoverview Builds a crew's capability set from its membership.
 *
 * Names are derived from agent names and must come out the same for the
 * same membership on every rebuild, so the planner sees a stable surface.
 */

import { EmptyCrewError } from '../utils/errors.js';
import type { ResolvedCrewMember } from '../types/domain.js';
import type { AgentTransport } from '../transport/types.js';
import { AgentCapability, type CallPolicy } from './agent-capability.js';
import { CapabilitySet } from './capability-set.js';

/** Tool-name length limit of the planning model provider. */
export const MAX_CAPABILITY_NAME_LENGTH = 64;

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function deriveBaseName(agentName: string): string {
  return `ask_${slugify(agentName) || 'agent'}`;
}

function truncateName(name: string): string {
  return name.length <= MAX_CAPABILITY_NAME_LENGTH ? name : name.slice(0, MAX_CAPABILITY_NAME_LENGTH);
}

function withSuffix(base: string, suffix: string): string {
  const stem = base.slice(0, Math.max(MAX_CAPABILITY_NAME_LENGTH - suffix.length, 4));
  return truncateName(`${stem}${suffix}`);
}

export function describeCapability(member: ResolvedCrewMember): string {
  const parts = [`Ask the ${member.agent.name} agent a question or give it a task.`];
  if (member.role.trim()) {
    parts.push(`Role in this crew: ${member.role.trim()}.`);
  }
  if (member.agent.description.trim()) {
    parts.push(`Capabilities: ${member.agent.description.trim()}`);
  }
  return parts.join(' ');
}

export function orderMembers(members: readonly ResolvedCrewMember[]): ResolvedCrewMember[] {
  return [...members].sort((a, b) => {
    if (a.position !== b.position) return a.position - b.position;
    return a.agentId < b.agentId ? -1 : a.agentId > b.agentId ? 1 : 0;
  });
}

/**
 * Assign a unique function name to each member. Members whose derived name
 * collides all get their agent id appended. The suffix is kept whole and
 * the stem is shortened when the result would exceed the length limit.
 */
export function assignNames(members: readonly ResolvedCrewMember[]): Map<string, string> {
  const baseNames = members.map((member) => deriveBaseName(member.agent.name));
  const counts = new Map<string, number>();
  for (const base of baseNames) {
    counts.set(base, (counts.get(base) ?? 0) + 1);
  }

  const names = new Map<string, string>();
  const used = new Set<string>();
  members.forEach((member, index) => {
    const base = baseNames[index];
    let name = truncateName(base);
    if ((counts.get(base) ?? 0) > 1) {
      name = withSuffix(base, `_${slugify(member.agentId) || 'agent'}`);
    }
    // A suffixed name can still meet another member's plain name.
    for (let n = 2; used.has(name); n++) {
      name = withSuffix(base, `_${n}`);
    }
    used.add(name);
    names.set(member.agentId, name);
  });
  return names;
}

export type CapabilityBinder = (crewId: string, members: readonly ResolvedCrewMember[]) => CapabilitySet;

/**
 * Create a binder that wraps each active member's agent behind the given
 * transport and call policy.
 */
export function createCapabilityBinder(transport: AgentTransport, policy: CallPolicy): CapabilityBinder {
  return (crewId, members) => {
    const active = orderMembers(members.filter((member) => member.agent.isActive));
    if (active.length === 0) {
      throw new EmptyCrewError(crewId);
    }

    const names = assignNames(active);
    const capabilities = active.map((member) => new AgentCapability({
      name: names.get(member.agentId) ?? deriveBaseName(member.agent.name),
      agentId: member.agentId,
      agentName: member.agent.name,
      role: member.role,
      description: describeCapability(member),
      connection: member.agent.connection,
      transport,
      policy,
    }));

    return new CapabilitySet(capabilities);
  };
}
