// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { NormalizedRecord, ProviderName } from './types';
import { ProviderMappers } from './ProviderMappers';
import { FetchFailedError } from '../../utils/errors';

export const NormalizedRecordSchema = z.object({
  title: z.string(),
  url: z.string().url(),
  subtitle: z.string(),
});

export class Normalizer {
  private mappers: ProviderMappers;

  constructor() {
    this.mappers = new ProviderMappers();
  }

  /**
   * Normalize raw provider items, keeping provider order.
   *
   * All-or-nothing: one malformed item fails the whole batch.
   */
  normalize(provider: ProviderName, rawItems: unknown[]): NormalizedRecord[] {
    const mapper = this.mappers.get(provider);
    if (!mapper) {
      throw new Error(`No mapper found for provider: ${provider}`);
    }

    const records: NormalizedRecord[] = [];
    rawItems.forEach((raw, index) => {
      try {
        const mapped = mapper(raw);
        if (mapped) {
          records.push(NormalizedRecordSchema.parse(mapped));
        }
      } catch (error) {
        throw new FetchFailedError(`Schema validation failed for ${provider} item ${index}`, {
          provider,
          index,
          cause: error instanceof z.ZodError ? error.issues : error,
        });
      }
    });

    return records;
  }
}
