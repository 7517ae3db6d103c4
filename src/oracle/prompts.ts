/**
 * Prompt text and transcript rendering shared by both strategies.
 */

import type { CapabilityDescriptor } from '../capabilities/agent-capability.js';
import type { TaskMessage } from '../types/domain.js';

export const TOOL_CALLING_SYSTEM_PROMPT = `You coordinate a crew of specialist agents to complete a task.

Each tool asks one agent of the crew. Call exactly one tool when you need
information or work from an agent. You may call the same agent more than
once. Read the transcript carefully: every agent reply and every failed call
is recorded there in order.

When the transcript contains enough to complete the task, stop calling tools
and reply with the final answer only.`;

export const PLAN_PROMPT = `You are a task orchestrator. Break the task below into sequential steps,
each assigned to one agent of the crew.

<task>
{task}
</task>

<available_agents>
{agents}
</available_agents>

<rules>
1. Use between 1 and {maxSteps} steps
2. Each step names the agent by its tool name and gives it a specific, self-contained message
3. Steps run in order; an agent does not see other agents' replies
</rules>

<output_format>
Respond with ONLY a JSON object (no markdown, no explanation):
{
  "steps": [
    { "capability": "ask_agent_name", "message": "What the agent should do" }
  ]
}
</output_format>`;

export const AGGREGATE_PROMPT = `You compile the replies of several agents into one final result.

<task>
{task}
</task>

Write a clear, complete answer to the task using the agent replies in the
transcript. Reply with the final answer only.`;

export function formatTask(title: string, description: string): string {
  return description.trim() && description.trim() !== title.trim()
    ? `Title: ${title}\nDescription: ${description}`
    : `Title: ${title}`;
}

export function formatCapabilities(capabilities: readonly CapabilityDescriptor[]): string {
  return capabilities.map((capability) => `- ${capability.name}: ${capability.description}`).join('\n');
}

/**
 * Render the transcript in order. Agent messages are labelled with the
 * capability name that produced them, so the model can tell agents apart.
 */
export function formatTranscript(
  transcript: readonly TaskMessage[],
  capabilities: readonly CapabilityDescriptor[]
): string {
  if (transcript.length === 0) {
    return '(empty)';
  }
  const byAgent = new Map(capabilities.map((capability) => [capability.agentId, capability.name]));
  return transcript
    .map((message, index) => {
      const label = message.author === 'agent'
        ? `agent ${message.agentId ? (byAgent.get(message.agentId) ?? message.agentId) : 'unknown'}`
        : message.author;
      return `[${index + 1}] ${label}: ${message.content}`;
    })
    .join('\n');
}
