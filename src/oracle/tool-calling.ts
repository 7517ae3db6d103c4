/**
 * @fileoverview Dynamic strategy: the model picks one capability per step.
 *
 * Capabilities are offered as tools taking a single `message` argument. A
 * tool_use block becomes an invoke action; a text-only reply concludes.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type {
  Message,
  MessageCreateParamsNonStreaming,
  TextBlock,
  Tool,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';

import { getClient } from '../services/anthropic/client.js';
import { OracleError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { OracleDecision, PlanningInput, PlanningOracle } from './types.js';
import { TOOL_CALLING_SYSTEM_PROMPT, formatTask, formatTranscript } from './prompts.js';

const logger = createLogger({ domain: 'oracle' });

export interface ModelOptions {
  model: string;
  maxTokens: number;
  client?: () => Anthropic;
}

export function toTool(capability: PlanningInput['capabilities'][number]): Tool {
  return {
    name: capability.name,
    description: capability.description,
    input_schema: {
      type: 'object',
      properties: {
        message: {
          type: 'string',
          description: `The question or instruction for the ${capability.agentName} agent`,
        },
      },
      required: ['message'],
    },
  };
}

export function usageOf(response: Message): OracleDecision['usage'] {
  return response.usage
    ? { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens }
    : undefined;
}

export function textOf(response: Message): string {
  return response.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('\n')
    .trim();
}

/**
 * Run one messages.create call, mapping any provider failure to OracleError.
 */
export async function callModel(
  client: Anthropic,
  params: MessageCreateParamsNonStreaming,
  step: string
): Promise<Message> {
  try {
    return await client.messages.create(params);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('oracle_call_failed', { step, model: params.model, error: message });
    throw new OracleError(`Planning model call failed (${step}): ${message}`, { step });
  }
}

export class ToolCallingOracle implements PlanningOracle {
  readonly name = 'tool_calling';

  constructor(private readonly options: ModelOptions) {}

  async plan(input: PlanningInput): Promise<OracleDecision> {
    const client = (this.options.client ?? getClient)();
    const userContent = [
      '<task>',
      formatTask(input.taskTitle, input.taskDescription),
      '</task>',
      '',
      '<transcript>',
      formatTranscript(input.transcript, input.capabilities),
      '</transcript>',
      '',
      'Decide the next step: call one agent, or give the final answer.',
    ].join('\n');

    const response = await callModel(client, {
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: 0,
      system: TOOL_CALLING_SYSTEM_PROMPT,
      tools: input.capabilities.map(toTool),
      tool_choice: { type: 'auto' },
      messages: [{ role: 'user', content: userContent }],
    }, 'next_action');

    const model = response.model || this.options.model;
    const usage = usageOf(response);
    const text = textOf(response);
    const toolUse = response.content.find(
      (block): block is ToolUseBlock => block.type === 'tool_use'
    );

    if (toolUse) {
      return {
        action: { type: 'invoke', capability: toolUse.name, message: toolMessage(toolUse.input) },
        model,
        usage,
        reasoning: text || undefined,
      };
    }

    if (!text) {
      throw new OracleError('Planning model returned neither a tool call nor an answer', {
        stopReason: response.stop_reason,
      });
    }

    return { action: { type: 'conclude', answer: text }, model, usage };
  }
}

function toolMessage(input: unknown): string {
  if (input && typeof input === 'object' && 'message' in input && typeof input.message === 'string') {
    return input.message;
  }
  return JSON.stringify(input ?? {});
}
