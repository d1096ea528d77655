/**
 * Randomized pauses between form interactions
 * - The site rejects sessions that click through its wizard too quickly
 * - Defaults: 500-2000ms random delay
 */

import { getLogger } from './logger.js';

export interface PacingOptions {
  minDelayMs?: number; // default 500
  maxDelayMs?: number; // default 2000
}

/**
 * Calculate random delay between minDelayMs and maxDelayMs
 */
export function calculateRandomDelay(minDelayMs: number, maxDelayMs: number): number {
  return minDelayMs + Math.random() * (maxDelayMs - minDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait a human-like amount of time before the next interaction
 */
export async function humanPause(options?: PacingOptions): Promise<void> {
  const minDelayMs = options?.minDelayMs ?? 500;
  const maxDelayMs = options?.maxDelayMs ?? 2000;
  const delayMs = calculateRandomDelay(minDelayMs, maxDelayMs);

  getLogger().debug(`Pausing ${Math.round(delayMs)}ms before next interaction`);
  await sleep(delayMs);
}

