/**
 * Taxonomy service.
 * Validates and normalizes taxonomy/tag names, then routes tagging and
 * search to the store. Tagging runs as one transaction.
 *
 * @module src/taxonomy/service
 */

import { DEFAULT_TAXONOMY } from '../app/constants';
import { splitCatalogPath } from '../core/catalog-path';
import {
  isValidName,
  normalizeTagValue,
  normalizeTaxonomyName,
} from '../core/taxonomy';
import { toCatalogPath } from '../core/validation';
import type {
  StorePort,
  StoreResult,
  TagUsageRow,
  TaxonomyRow,
} from '../store/types';
import { err, mustOk, ok } from '../store/types';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type TaxonomyServiceOptions = {
  /** Catalog root (absolute) */
  root: string;
  /** Base for relative file paths (default: process.cwd()) */
  cwd?: string;
};

/** A (taxonomy, value) pair resolved from CLI flags */
export type TagAssignment = {
  taxonomy: string;
  value: string;
};

/** Outcome of one tagging operation */
export type TagResult = {
  path: string;
  taxonomy: string;
  value: string;
  /** False when the file already carried this tag */
  created: boolean;
};

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

function validateTaxonomy(name: string): StoreResult<string> {
  const normalized = normalizeTaxonomyName(name);
  if (!isValidName(normalized)) {
    return err('VALIDATION', 'Taxonomy name cannot be empty');
  }
  return ok(normalized);
}

function validateTagValue(value: string): StoreResult<string> {
  const normalized = normalizeTagValue(value);
  if (!isValidName(normalized)) {
    return err('VALIDATION', 'Tag value cannot be empty');
  }
  return ok(normalized);
}

// ─────────────────────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────────────────────

export class TaxonomyService {
  private readonly store: StorePort;
  private readonly root: string;
  private readonly cwd: string | undefined;

  constructor(store: StorePort, options: TaxonomyServiceOptions) {
    this.store = store;
    this.root = options.root;
    this.cwd = options.cwd;
  }

  /**
   * Create a taxonomy. DUPLICATE if it already exists.
   */
  async defineTaxonomy(name: string): Promise<StoreResult<TaxonomyRow>> {
    const taxonomy = validateTaxonomy(name);
    if (!taxonomy.ok) {
      return taxonomy;
    }
    return this.store.createTaxonomy(taxonomy.value);
  }

  /**
   * Attach a tag value under a taxonomy to a cataloged file.
   * Taxonomy and tag are created on demand; all writes roll back together.
   */
  async tag(
    filePath: string,
    taxonomyName: string,
    tagValue: string
  ): Promise<StoreResult<TagResult>> {
    if (filePath.trim().length === 0) {
      return err('VALIDATION', 'File path cannot be empty');
    }
    const taxonomy = validateTaxonomy(taxonomyName);
    if (!taxonomy.ok) {
      return taxonomy;
    }
    const value = validateTagValue(tagValue);
    if (!value.ok) {
      return value;
    }

    let path: string;
    try {
      path = toCatalogPath(this.root, filePath, this.cwd);
    } catch (e) {
      return err('VALIDATION', e instanceof Error ? e.message : String(e));
    }
    // Resolve by the file's real directory, never a fixed one
    const { directory, filename } = splitCatalogPath(path);
    const taxonomyKey = taxonomy.value;
    const tagName = value.value;

    return this.store.withTransaction(async () => {
      const fileId = mustOk(await this.store.resolveFileId(directory, filename));
      const taxonomyId = mustOk(
        await this.store.getOrCreateTaxonomy(taxonomyKey)
      );
      const tagId = mustOk(await this.store.getOrCreateTag(taxonomyId, tagName));
      const created = mustOk(await this.store.associateTag(fileId, tagId));
      return { path, taxonomy: taxonomyKey, value: tagName, created };
    });
  }

  /**
   * Tag a file under the default taxonomy.
   */
  async tagDefault(
    filePath: string,
    tagValue: string
  ): Promise<StoreResult<TagResult>> {
    return this.tag(filePath, DEFAULT_TAXONOMY, tagValue);
  }

  /**
   * Paths of files carrying the value. Empty when nothing matches.
   */
  async search(
    taxonomyName: string,
    tagValue: string
  ): Promise<StoreResult<string[]>> {
    const taxonomy = validateTaxonomy(taxonomyName);
    if (!taxonomy.ok) {
      return taxonomy;
    }
    const value = validateTagValue(tagValue);
    if (!value.ok) {
      return value;
    }
    return this.store.searchByTag(taxonomy.value, value.value);
  }

  async listTaxonomies(): Promise<StoreResult<TaxonomyRow[]>> {
    return this.store.listTaxonomies();
  }

  async listTags(
    taxonomyName: string = DEFAULT_TAXONOMY
  ): Promise<StoreResult<TagUsageRow[]>> {
    const taxonomy = validateTaxonomy(taxonomyName);
    if (!taxonomy.ok) {
      return taxonomy;
    }
    return this.store.listTags(taxonomy.value);
  }
}
