/**
 * PlanilhaStore
 *
 * File-backed store of planilhas (named batches of invoice lines). Appends
 * merge by dedup key, so re-running a collection never duplicates rows.
 *
 * Layout: {baseDir}/{planilha_id}.json, one JSON document per planilha.
 * Writes go to a temp file in the same directory and are renamed over the
 * target. Appends to one id are serialized within the process.
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Line } from '../../types/lines.js';
import { formatLocalTimestamp } from '../../utils/dates.js';
import { ConflictError, NotFoundError, ValidationError, errorMessage } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';

// =============================================================================
// Document schema
// =============================================================================

const lineSchema = z.record(z.string(), z.string());

export const planilhaSchema = z.object({
  planilha_id: z.string(),
  version: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
  row_count: z.number().int().nonnegative(),
  meta: z.record(z.string(), z.unknown()),
  lines: z.array(lineSchema),
  index: z.object({ dedup_ids: z.array(z.string()) }),
});

export type PlanilhaDocument = z.infer<typeof planilhaSchema>;

export interface PlanilhaSummary {
  planilha_id: string;
  created_at: string;
  updated_at: string;
  row_count: number;
}

export interface AppendResult {
  added: number;
  updated: number;
}

export interface PlanilhaStoreConfig {
  baseDir: string;

  /**
   * IANA zone of created_at / updated_at
   * @default 'America/Sao_Paulo'
   */
  timeZone?: string;

  now?: () => Date;
  logger?: Logger;
}

export const PLANILHA_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

const DEDUP_KEY_FIELDS = ['dedup_id', 'id_line_item', 'line_item_id', 'transaction_id'] as const;

/**
 * First non-empty key field of a line, or null
 */
export function dedupKeyOf(line: Line): string | null {
  for (const field of DEDUP_KEY_FIELDS) {
    const value = line[field]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

/**
 * Copy of `line` whose dedup_id carries its inferred key, when it has one
 */
function withDedupId(line: Line): Line {
  const key = dedupKeyOf(line);
  return key === null ? { ...line } : { ...line, dedup_id: key };
}

// =============================================================================
// PlanilhaStore
// =============================================================================

export class PlanilhaStore {
  private readonly baseDir: string;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(config: PlanilhaStoreConfig) {
    this.baseDir = config.baseDir;
    this.timeZone = config.timeZone ?? 'America/Sao_Paulo';
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? createChildLogger({ module: 'PlanilhaStore' });
  }

  async create(planilhaId: string, meta: Record<string, unknown> = {}): Promise<PlanilhaDocument> {
    const path = this.pathOf(planilhaId);

    return this.withLock(planilhaId, async () => {
      if (await this.read(path)) {
        throw new ConflictError('Planilha', planilhaId);
      }

      const timestamp = this.timestamp();
      const document: PlanilhaDocument = {
        planilha_id: planilhaId,
        version: 1,
        created_at: timestamp,
        updated_at: timestamp,
        row_count: 0,
        meta,
        lines: [],
        index: { dedup_ids: [] },
      };

      await this.save(path, document);
      this.logger.info({ planilhaId }, 'Planilha created');
      return document;
    });
  }

  async load(planilhaId: string): Promise<PlanilhaDocument> {
    const document = await this.read(this.pathOf(planilhaId));
    if (!document) {
      throw new NotFoundError('Planilha', planilhaId);
    }
    return document;
  }

  async list(): Promise<PlanilhaSummary[]> {
    let files: string[];
    try {
      files = await readdir(this.baseDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const summaries: PlanilhaSummary[] = [];
    for (const file of files.filter((name) => name.endsWith('.json')).sort()) {
      let document: PlanilhaDocument | null;
      try {
        document = await this.read(join(this.baseDir, file));
      } catch (error) {
        this.logger.warn({ file, error: errorMessage(error) }, 'Skipping unreadable planilha file');
        continue;
      }
      if (document) {
        summaries.push({
          planilha_id: document.planilha_id,
          created_at: document.created_at,
          updated_at: document.updated_at,
          row_count: document.row_count,
        });
      }
    }
    return summaries;
  }

  /**
   * Merge lines into a planilha: new keys are appended, known keys have
   * their fields updated, keyless lines are always appended
   */
  async append(planilhaId: string, lines: readonly Line[]): Promise<AppendResult> {
    const path = this.pathOf(planilhaId);

    return this.withLock(planilhaId, async () => {
      const document = await this.read(path);
      if (!document) {
        throw new NotFoundError('Planilha', planilhaId);
      }

      const positions = new Map<string, number>();
      document.lines = document.lines.map(withDedupId);
      document.lines.forEach((line, position) => {
        const key = dedupKeyOf(line);
        if (key !== null && !positions.has(key)) {
          positions.set(key, position);
        }
      });

      let added = 0;
      let updated = 0;
      for (const incoming of lines) {
        const line = withDedupId(incoming);
        const key = dedupKeyOf(line);
        const position = key === null ? undefined : positions.get(key);
        const existing = position === undefined ? undefined : document.lines[position];

        if (position !== undefined && existing) {
          document.lines[position] = { ...existing, ...line };
          updated++;
          continue;
        }

        document.lines.push(line);
        if (key !== null) {
          positions.set(key, document.lines.length - 1);
        }
        added++;
      }

      document.row_count = document.lines.length;
      document.index.dedup_ids = [...positions.keys()].sort();
      document.updated_at = this.timestamp();

      await this.save(path, document);
      this.logger.info({ planilhaId, added, updated, rowCount: document.row_count }, 'Lines appended');
      return { added, updated };
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private pathOf(planilhaId: string): string {
    if (!PLANILHA_ID_PATTERN.test(planilhaId)) {
      throw new ValidationError(`Invalid planilha id: ${planilhaId}`, 'planilha_id');
    }
    return join(this.baseDir, `${planilhaId}.json`);
  }

  private timestamp(): string {
    return formatLocalTimestamp(this.now(), this.timeZone);
  }

  private async read(path: string): Promise<PlanilhaDocument | null> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    return planilhaSchema.parse(JSON.parse(text));
  }

  private async save(path: string, document: PlanilhaDocument): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    const temp = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(temp, JSON.stringify(document, null, 2), 'utf-8');
      await rename(temp, path);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  private async withLock<T>(planilhaId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(planilhaId) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(planilhaId, settled);

    try {
      return await run;
    } finally {
      if (this.locks.get(planilhaId) === settled) {
        this.locks.delete(planilhaId);
      }
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
