import type { CatalogEntry } from '../types/catalog.js';

/** Shared queue the workers pull from; each entry is handed out exactly once. */
export class WorkQueue {
  private readonly queue: CatalogEntry[];
  private readonly initialSize: number;

  constructor(entries: CatalogEntry[]) {
    this.queue = [...entries];
    this.initialSize = entries.length;
  }

  next(): CatalogEntry | null {
    return this.queue.shift() ?? null;
  }

  get size(): number {
    return this.queue.length;
  }

  get total(): number {
    return this.initialSize;
  }
}
