/**
 * Quality curation pass over the example store.
 *
 * - deprioritizes examples whose success rate fell below the floor once
 *   they have been used often enough to judge
 * - restores deprioritized examples whose rate has recovered
 * - backfills embeddings that are missing or were made by another model
 *
 * Examples are never deleted.
 *
 * @module services/feedback/curation
 */

import type { EmbeddingProvider } from '../../models/ports.js';
import type { ExampleStore } from '../examples/example-store.js';

export interface CurationConfig {
  minSuccessRate: number;
  minUsageForCuration: number;
}

export interface CurationReport {
  scanned: number;
  deprioritized: number;
  restored: number;
  embeddingsBackfilled: number;
  /** Backfill stops at the first embedding failure */
  embeddingBackfillStopped: boolean;
  durationMs: number;
}

export class QualityCurator {
  constructor(
    private readonly store: ExampleStore,
    private readonly embedder: EmbeddingProvider | null,
    private readonly config: CurationConfig
  ) {}

  async runCuration(): Promise<CurationReport> {
    const startTime = Date.now();
    const report: CurationReport = {
      scanned: 0,
      deprioritized: 0,
      restored: 0,
      embeddingsBackfilled: 0,
      embeddingBackfillStopped: false,
      durationMs: 0,
    };
    let canEmbed = this.embedder !== null;

    for (const example of this.store.scanAll()) {
      report.scanned++;

      if (example.usage_count >= this.config.minUsageForCuration) {
        const rate = example.success_count / example.usage_count;
        if (!example.deprioritized && rate < this.config.minSuccessRate) {
          if (this.store.setDeprioritized(example.id, true)) report.deprioritized++;
        } else if (example.deprioritized && rate >= this.config.minSuccessRate) {
          if (this.store.setDeprioritized(example.id, false)) report.restored++;
        }
      }

      if (!canEmbed || !this.embedder) continue;
      if (example.embedding && example.embedding_model === this.embedder.model) continue;

      try {
        const vector = await this.embedder.embed(example.input_context);
        if (this.store.setEmbedding(example.id, vector, this.embedder.model)) report.embeddingsBackfilled++;
      } catch (error) {
        console.error(
          `[Curation] Embedding backfill stopped: ${error instanceof Error ? error.message : String(error)}`
        );
        canEmbed = false;
        report.embeddingBackfillStopped = true;
      }
    }

    report.durationMs = Date.now() - startTime;
    console.error(
      `[Curation] Scanned ${report.scanned}, deprioritized ${report.deprioritized}, restored ${report.restored}, ` +
        `backfilled ${report.embeddingsBackfilled} embedding(s)`
    );
    return report;
  }
}
