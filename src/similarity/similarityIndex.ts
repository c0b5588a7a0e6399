import { InvalidArgumentError, NotFoundError } from '../errors.js';
import type { Catalog, Item, SimilarityMatrix } from '../types/index.js';

export const DEFAULT_TOP_K = 4;

export class SimilarityIndex {
  private readonly items: readonly Item[];
  private readonly matrix: SimilarityMatrix;
  private readonly positionByTitle: Map<string, number>;

  constructor(catalog: Catalog) {
    const { items, similarity } = catalog;
    if (similarity.length !== items.length) {
      throw new InvalidArgumentError(
        `Similarity matrix has ${similarity.length} rows but the catalog has ${items.length} items.`,
      );
    }

    this.positionByTitle = new Map();
    items.forEach((item, index) => {
      const row = similarity[index];
      if (!row || row.length !== items.length) {
        throw new InvalidArgumentError(
          `Similarity row ${index} has ${row?.length ?? 0} columns, expected ${items.length}.`,
        );
      }
      if (this.positionByTitle.has(item.title)) {
        throw new InvalidArgumentError(`Duplicate catalog title: "${item.title}".`);
      }
      this.positionByTitle.set(item.title, index);
    });

    this.items = items;
    this.matrix = similarity;
  }

  get size(): number {
    return this.items.length;
  }

  titles(): string[] {
    return this.items.map((item) => item.title);
  }

  has(title: string): boolean {
    return this.positionByTitle.has(title);
  }

  /**
   * Returns the `k` items most similar to `title`, best first. Equal scores
   * keep catalog order, and the queried item never appears in the result.
   */
  topK(title: string, k: number = DEFAULT_TOP_K): Item[] {
    const maxK = this.items.length - 2;
    if (!Number.isInteger(k) || k < 1 || k > maxK) {
      throw new InvalidArgumentError(
        maxK < 1
          ? `Catalog of ${this.items.length} items is too small for recommendations.`
          : `k must be an integer between 1 and ${maxK}, got ${k}.`,
      );
    }

    const position = this.positionByTitle.get(title);
    if (position === undefined) {
      throw new NotFoundError(`No catalog item titled "${title}".`);
    }

    const row = this.matrix[position] ?? [];
    const ranked = row
      .map((score, index) => ({ score, index }))
      .filter((candidate) => candidate.index !== position)
      .sort((a, b) => b.score - a.score || a.index - b.index);

    return ranked.slice(0, k).map((candidate) => this.itemAt(candidate.index));
  }

  suggest(query: string, limit: number = 5): string[] {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }
    return this.items
      .filter((item) => item.title.toLowerCase().includes(needle))
      .slice(0, limit)
      .map((item) => item.title);
  }

  private itemAt(index: number): Item {
    const item = this.items[index];
    if (!item) {
      throw new InvalidArgumentError(`Catalog index ${index} is out of range.`);
    }
    return item;
  }
}
