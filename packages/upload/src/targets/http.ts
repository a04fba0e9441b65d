/**
 * HTTP Transport
 *
 * undici settings shared by the HTTP destinations. The connect timeout lives
 * on the Agent, so there is one Agent per distinct connect timeout.
 */

import { Agent, type Dispatcher } from 'undici';
import type { TransferPolicy } from '../policy.js';

const agents = new Map<number, Agent>();

export function dispatcherFor(policy: TransferPolicy): Dispatcher {
  let agent = agents.get(policy.connectTimeoutMs);
  if (!agent) {
    agent = new Agent({ connect: { timeout: policy.connectTimeoutMs } });
    agents.set(policy.connectTimeoutMs, agent);
  }
  return agent;
}

export function timeoutOptions(policy: TransferPolicy): {
  headersTimeout: number;
  bodyTimeout: number;
  signal: AbortSignal;
} {
  return {
    headersTimeout: policy.idleTimeoutMs,
    bodyTimeout: policy.idleTimeoutMs,
    signal: AbortSignal.timeout(policy.totalTimeoutMs),
  };
}

/**
 * Close every pooled connection so the process can exit
 */
export async function closeHttpAgents(): Promise<void> {
  const pending = [...agents.values()].map(agent => agent.close());
  agents.clear();
  await Promise.all(pending);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
