/**
 * @fileoverview Fixed-plan strategy.
 *
 * The first planning step asks the model for the whole plan. Following
 * steps replay it one invoke at a time without a model call, and the last
 * step asks the model to aggregate the transcript into the final answer.
 * One instance serves exactly one task run.
 */

import type Anthropic from '@anthropic-ai/sdk';

import { getClient } from '../services/anthropic/client.js';
import { OracleError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { TokenUsage } from '../telemetry/types.js';
import type { InvokeCapability, OracleDecision, PlanningInput, PlanningOracle } from './types.js';
import { AGGREGATE_PROMPT, PLAN_PROMPT, formatCapabilities, formatTask, formatTranscript } from './prompts.js';
import { callModel, textOf, usageOf, type ModelOptions } from './tool-calling.js';

const logger = createLogger({ domain: 'oracle' });

export interface FixedPlanOptions extends ModelOptions {
  maxSteps: number;
}

type RawPlan = { steps: unknown[] };

/**
 * Parse the model's plan. Accepts bare JSON or JSON inside a fenced block;
 * returns null when no steps array can be found.
 */
export function parsePlanResponse(text: string): RawPlan | null {
  const jsonMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonText = jsonMatch ? jsonMatch[1].trim() : text.trim();

  try {
    const parsed: unknown = JSON.parse(jsonText);
    if (typeof parsed !== 'object' || parsed === null || !('steps' in parsed) || !Array.isArray(parsed.steps)) {
      logger.warn('plan_missing_steps');
      return null;
    }
    return { steps: parsed.steps };
  } catch (error) {
    logger.warn('plan_parse_failed', { error: error instanceof Error ? error.message : String(error) });
    return null;
  }
}

/**
 * Keep well-formed steps that name a known capability, up to maxSteps.
 */
export function toPlanSteps(
  raw: RawPlan | null,
  known: ReadonlySet<string>,
  maxSteps: number
): InvokeCapability[] {
  if (!raw) return [];
  const steps: InvokeCapability[] = [];
  for (const step of raw.steps) {
    if (steps.length >= maxSteps) break;
    if (typeof step !== 'object' || step === null) continue;
    if (!('capability' in step) || !('message' in step)) continue;
    const { capability, message } = step;
    if (typeof capability !== 'string' || typeof message !== 'string' || !message.trim()) continue;
    if (!known.has(capability)) {
      logger.warn('plan_step_dropped', { capability });
      continue;
    }
    steps.push({ type: 'invoke', capability, message });
  }
  return steps;
}

function addUsage(a: TokenUsage | undefined, b: TokenUsage | undefined): TokenUsage | undefined {
  if (!a) return b;
  if (!b) return a;
  return { inputTokens: a.inputTokens + b.inputTokens, outputTokens: a.outputTokens + b.outputTokens };
}

export class FixedPlanOracle implements PlanningOracle {
  readonly name = 'fixed_plan';

  private steps: InvokeCapability[] | null = null;
  private cursor = 0;

  constructor(private readonly options: FixedPlanOptions) {}

  /** The plan once made, for inspection. */
  get planned(): readonly InvokeCapability[] | null {
    return this.steps;
  }

  async plan(input: PlanningInput): Promise<OracleDecision> {
    if (this.steps === null) {
      const planned = await this.makePlan(input);
      this.steps = planned.steps;
      const first = this.next();
      if (first) {
        return {
          action: first,
          model: planned.model,
          usage: planned.usage,
          reasoning: `Plan: ${this.steps.map((step) => step.capability).join(' -> ')}`,
        };
      }
      // Nothing usable planned: answer from what the transcript already holds.
      const aggregated = await this.aggregate(input);
      return { ...aggregated, usage: addUsage(planned.usage, aggregated.usage) };
    }

    const step = this.next();
    if (step) {
      return { action: step };
    }
    return this.aggregate(input);
  }

  private next(): InvokeCapability | undefined {
    if (!this.steps || this.cursor >= this.steps.length) return undefined;
    return this.steps[this.cursor++];
  }

  private client(): Anthropic {
    return (this.options.client ?? getClient)();
  }

  private async makePlan(input: PlanningInput): Promise<{ steps: InvokeCapability[]; model: string; usage?: TokenUsage }> {
    const prompt = PLAN_PROMPT
      .replace('{task}', formatTask(input.taskTitle, input.taskDescription))
      .replace('{agents}', formatCapabilities(input.capabilities))
      .replace('{maxSteps}', String(this.options.maxSteps));

    const response = await callModel(this.client(), {
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: 0,
      system: prompt,
      messages: [{ role: 'user', content: input.taskDescription || input.taskTitle }],
    }, 'plan');

    const known = new Set(input.capabilities.map((capability) => capability.name));
    const steps = toPlanSteps(parsePlanResponse(textOf(response)), known, this.options.maxSteps);
    logger.info('plan_created', { stepCount: steps.length, capabilities: steps.map((step) => step.capability) });

    return { steps, model: response.model || this.options.model, usage: usageOf(response) };
  }

  private async aggregate(input: PlanningInput): Promise<OracleDecision> {
    const response = await callModel(this.client(), {
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: 0,
      system: AGGREGATE_PROMPT.replace('{task}', formatTask(input.taskTitle, input.taskDescription)),
      messages: [{
        role: 'user',
        content: `<transcript>\n${formatTranscript(input.transcript, input.capabilities)}\n</transcript>`,
      }],
    }, 'aggregate');

    const answer = textOf(response);
    if (!answer) {
      throw new OracleError('Planning model returned an empty final answer', { stopReason: response.stop_reason });
    }

    return {
      action: { type: 'conclude', answer },
      model: response.model || this.options.model,
      usage: usageOf(response),
    };
  }
}
