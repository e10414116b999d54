/**
 * Product Catalog
 *
 * Name -> SkuInfo map loaded from the catalog JSON file. Lookups by name fall
 * back to a diacritics-insensitive match.
 */

import { readFile } from 'node:fs/promises';
import type { Periodicity, Tier } from '../types/domain.js';
import { catalogFileSchema } from '../types/catalog.js';
import type { CatalogFile, SkuInfo } from '../types/catalog.js';
import { ConfigurationError, ValidationError, errorMessage } from '../utils/errors.js';
import { normalizeText } from '../utils/text.js';

export interface CatalogEntry {
  name: string;
  info: SkuInfo;
}

/**
 * Plan ids of subscription products grouped by tier, plus the union
 */
export interface PlanIds {
  byTier: Map<Tier, string[]>;
  all: Set<string>;
}

export class Catalog {
  private readonly entries: Map<string, SkuInfo>;
  private readonly nameIndex = new Map<string, string>();
  private readonly guruIdIndex = new Map<string, string>();
  private readonly skuIndex = new Map<string, string>();

  constructor(file: CatalogFile) {
    this.entries = new Map(Object.entries(file));
    for (const [name, info] of this.entries) {
      const key = normalizeText(name);
      if (!this.nameIndex.has(key)) {
        this.nameIndex.set(key, name);
      }
      for (const id of info.guru_ids) {
        if (id && !this.guruIdIndex.has(id)) {
          this.guruIdIndex.set(id, name);
        }
      }
      const sku = info.sku.trim().toUpperCase();
      if (sku && !this.skuIndex.has(sku)) {
        this.skuIndex.set(sku, name);
      }
    }
  }

  /**
   * Load and validate a catalog file
   */
  static async load(path: string): Promise<Catalog> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read catalog ${path}: ${errorMessage(error)}`);
    }

    const result = catalogFileSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigurationError(
        `Invalid catalog ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`
      );
    }
    return new Catalog(result.data);
  }

  get size(): number {
    return this.entries.size;
  }

  list(): CatalogEntry[] {
    return [...this.entries].map(([name, info]) => ({ name, info }));
  }

  /**
   * Entry by exact or normalized name
   */
  find(name: string): CatalogEntry | undefined {
    const exact = this.entries.get(name);
    if (exact) {
      return { name, info: exact };
    }
    const canonical = this.nameIndex.get(normalizeText(name));
    const info = canonical === undefined ? undefined : this.entries.get(canonical);
    return canonical !== undefined && info ? { name: canonical, info } : undefined;
  }

  findByGuruId(productId: string): CatalogEntry | undefined {
    const name = this.guruIdIndex.get(productId.trim());
    return name === undefined ? undefined : this.find(name);
  }

  findBySku(sku: string): CatalogEntry | undefined {
    const name = this.skuIndex.get(sku.trim().toUpperCase());
    return name === undefined ? undefined : this.find(name);
  }

  first(): CatalogEntry | undefined {
    for (const [name, info] of this.entries) {
      return { name, info };
    }
    return undefined;
  }

  skuOf(name: string): string {
    return this.find(name)?.info.sku.trim() ?? '';
  }

  isUnavailable(name: string): boolean {
    return this.find(name)?.info.unavailable ?? false;
  }

  /**
   * Plan ids of the subscriptions shipped at `periodicity`, by tier
   */
  planIds(periodicity: Periodicity): PlanIds {
    const byTier = new Map<Tier, string[]>();
    const all = new Set<string>();

    for (const info of this.entries.values()) {
      if (info.type !== 'subscription' || info.periodicity !== periodicity || !info.recurrence) {
        continue;
      }
      const ids = byTier.get(info.recurrence) ?? [];
      for (const id of info.guru_ids) {
        if (id && !ids.includes(id)) {
          ids.push(id);
        }
        if (id) {
          all.add(id);
        }
      }
      byTier.set(info.recurrence, ids);
    }

    return { byTier, all };
  }

  /**
   * Guru ids of one product, or of every non-subscription product
   */
  productIds(productName?: string): string[] {
    let targets: CatalogEntry[];

    if (productName) {
      const entry = this.find(productName);
      if (!entry) {
        throw new ValidationError(`Unknown product: ${productName}`, 'product_name');
      }
      if (entry.info.type === 'subscription') {
        throw new ValidationError(`${entry.name} is a subscription; select a product`, 'product_name');
      }
      targets = [entry];
    } else {
      targets = this.list().filter((entry) => entry.info.type !== 'subscription');
    }

    const ids = targets.flatMap((entry) => entry.info.guru_ids).filter((id) => id !== '');
    if (ids.length === 0) {
      throw new ValidationError('No eligible product with Guru ids found for collection', 'product_name');
    }
    return [...new Set(ids)];
  }
}
