/**
 * Anthropic client shared by the planning oracles.
 */

import Anthropic from '@anthropic-ai/sdk';
import config from '../../config.js';
import { OracleError } from '../../utils/errors.js';

let client: Anthropic | null = null;

/**
 * Get the lazily created client. A missing key fails the planning step
 * that asked for it, not process start-up.
 */
export function getClient(): Anthropic {
  if (!client) {
    if (!config.anthropicApiKey) {
      throw new OracleError('ANTHROPIC_API_KEY not configured');
    }
    client = new Anthropic({ apiKey: config.anthropicApiKey });
  }
  return client;
}
