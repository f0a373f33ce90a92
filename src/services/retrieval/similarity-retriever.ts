/**
 * Similarity Retriever
 *
 * Selects up to k stored examples per field for a batch. The query context
 * is embedded once and shared by every field in the batch; candidates are
 * scored by weighted cosine similarity and example quality.
 *
 * Degrades to "no examples" when the embedding service or the store is
 * unavailable. Never throws for those conditions.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/retrieval/similarity-retriever
 */

import type { Example } from '../../models/example.js';
import type { EmbeddingProvider } from '../../models/ports.js';
import type { ExampleStore } from '../examples/example-store.js';
import { qualityScore } from '../examples/ranking.js';
import { clamp, cosineSimilarity } from '../../utils/math.js';

export interface RetrievalConfig {
  k: number;
  maxK: number;
  minSimilarity: number;
  similarityWeight: number;
  qualityWeight: number;
}

export interface RetrievalQuery {
  context: string;
  fieldNames: string[];
  domainCategory: string;
  variant: string;
}

export interface RetrievedExample {
  example: Example;
  similarity: number;
  quality: number;
  score: number;
}

export class SimilarityRetriever {
  constructor(
    private readonly store: ExampleStore,
    private readonly embedder: EmbeddingProvider | null,
    private readonly config: RetrievalConfig
  ) {}

  /**
   * @returns One entry per requested field, best example first. Fields
   *   without qualifying examples map to an empty list.
   */
  async retrieve(
    query: RetrievalQuery,
    options: { k?: number; signal?: AbortSignal } = {}
  ): Promise<Map<string, RetrievedExample[]>> {
    const results = new Map<string, RetrievedExample[]>();
    for (const name of query.fieldNames) {
      results.set(name, []);
    }
    if (query.fieldNames.length === 0) return results;

    const k = clamp(Math.floor(options.k ?? this.config.k), 1, this.config.maxK);

    let candidates: Example[];
    try {
      candidates = this.store.listCandidates(query.domainCategory, query.variant, query.fieldNames);
    } catch (error) {
      console.error(
        `[Retriever] Example lookup failed, continuing without examples: ${error instanceof Error ? error.message : String(error)}`
      );
      return results;
    }
    if (candidates.length === 0) return results;

    if (!this.embedder) {
      console.error('[Retriever] No embedding provider configured, continuing without examples');
      return results;
    }

    let queryVector: Float32Array;
    try {
      queryVector = await this.embedder.embed(query.context, options.signal);
    } catch (error) {
      console.error(
        `[Retriever] Embedding unavailable, continuing without examples: ${error instanceof Error ? error.message : String(error)}`
      );
      return results;
    }

    const scored = new Map<string, RetrievedExample[]>();
    for (const example of candidates) {
      if (!example.embedding || example.embedding.length !== queryVector.length) continue;

      const similarity = cosineSimilarity(queryVector, example.embedding);
      if (similarity < this.config.minSimilarity) continue;

      const quality = qualityScore(example);
      const entry: RetrievedExample = {
        example,
        similarity,
        quality,
        score: this.config.similarityWeight * similarity + this.config.qualityWeight * quality,
      };
      const bucket = scored.get(example.field_name);
      if (bucket) {
        bucket.push(entry);
      } else {
        scored.set(example.field_name, [entry]);
      }
    }

    for (const [fieldName, bucket] of scored) {
      if (!results.has(fieldName)) continue;
      bucket.sort((a, b) => b.score - a.score);
      const selected = bucket.slice(0, k);
      results.set(fieldName, selected);
      for (const entry of selected) {
        this.recordUsage(entry.example.id);
      }
    }

    return results;
  }

  private recordUsage(id: string): void {
    try {
      this.store.recordUsage(id);
    } catch (error) {
      console.error(
        `[Retriever] Failed to record usage for example ${id}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
