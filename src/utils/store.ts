/**
 * In-memory Dataset Store
 *
 * Holds uploaded datasets for the lifetime of the process. Nothing is persisted.
 */

import { v4 as uuidv4 } from 'uuid';
import { MAX_DATASETS } from '../config/server';
import { DatasetRecord } from '../types/dataset';
import { Reading } from '../types/temperature';
import { listCities } from './dataset';

export class DatasetStore {
  private readonly datasets = new Map<string, DatasetRecord>();

  constructor(private readonly maxDatasets: number = MAX_DATASETS) {}

  get size(): number {
    return this.datasets.size;
  }

  /**
   * Store readings under a new id, evicting the oldest dataset when full
   */
  add(readings: Reading[]): DatasetRecord {
    const record: DatasetRecord = {
      id: uuidv4(),
      created_at: Date.now(),
      readings,
      cities: listCities(readings),
    };

    this.datasets.set(record.id, record);

    // Map iteration order is insertion order
    while (this.datasets.size > this.maxDatasets) {
      const oldest = this.datasets.keys().next();
      if (oldest.done) break;
      this.datasets.delete(oldest.value);
    }

    return record;
  }

  get(id: string): DatasetRecord | undefined {
    return this.datasets.get(id);
  }

  delete(id: string): boolean {
    return this.datasets.delete(id);
  }
}
