/**
 * Demo provider - canned persona replies picked by keyword, no network involved
 */
import type {
  AIProvider,
  AIProviderResponse,
  DemoBucket,
  DemoResponseTable,
  GenerationRequest,
} from '../types/index';
import { sleep } from '../utils/timing';

export interface DemoOptions {
  minDelayMs: number;
  maxDelayMs: number;
  /**
   * Source of randomness in [0, 1); swapped out in tests
   */
  random?: () => number;
}

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

function matches(text: string, bucket: DemoBucket): boolean {
  return containsAny(text, bucket.keywords);
}

/**
 * Picks the candidate list for a message; first matching bucket wins
 */
export function selectCandidates(table: DemoResponseTable, userMessage: string): string[] {
  const text = userMessage.toLowerCase();

  if (matches(text, table.greeting)) {
    return table.greeting.responses;
  }

  if (containsAny(text, table.definition.triggers)) {
    const topic = table.definition.topics.find((bucket) => matches(text, bucket));
    return topic ? topic.responses : table.definition.fallback;
  }

  if (matches(text, table.colony)) {
    return table.colony.responses;
  }

  if (matches(text, table.ancestors)) {
    return table.ancestors.responses;
  }

  return table.fallback;
}

/**
 * Demo provider - always configured, always healthy
 */
export class DemoProvider implements AIProvider {
  readonly name = 'Demo';
  readonly isConfigured = true;
  private readonly table: DemoResponseTable;
  private readonly options: DemoOptions;
  private readonly random: () => number;

  constructor(table: DemoResponseTable, options: DemoOptions) {
    this.table = table;
    this.options = options;
    this.random = options.random ?? Math.random;
  }

  async health(): Promise<boolean> {
    return true;
  }

  /**
   * Waits a random moment so replies feel as slow as a real model, then picks one
   */
  async generate(request: GenerationRequest): Promise<AIProviderResponse> {
    const { minDelayMs, maxDelayMs } = this.options;
    const delay = minDelayMs + this.random() * Math.max(0, maxDelayMs - minDelayMs);
    if (delay > 0) {
      await sleep(delay);
    }

    const candidates = selectCandidates(this.table, request.userMessage);
    const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    return { content: candidates[index] };
  }
}
