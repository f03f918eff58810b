import type { OutcomeLog, OutcomeRecord } from './types.js';

export class InMemoryOutcomeLog implements OutcomeLog {
  private readonly outcomes: OutcomeRecord[] = [];

  async init(): Promise<void> {}

  async append(outcome: OutcomeRecord): Promise<void> {
    this.outcomes.push({ ...outcome });
  }

  async readAll(): Promise<OutcomeRecord[]> {
    return this.outcomes.map(outcome => ({ ...outcome }));
  }
}
