/**
 * JSON file persistence for the ledger and the mapping store.
 * Documents are read whole, validated, and rewritten whole through a
 * temporary file that is renamed over the target.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { z } from 'zod';
import {
  LedgerDocumentSchema,
  MappingDocumentSchema,
  PersistError,
  formatZodError,
  type DocumentStore,
  type LedgerDocument,
  type LoadResult,
  type MappingDocument,
} from '@duesledger/types';

export const DEFAULT_LEDGER_PATH = join('data', 'ledger.json');
export const DEFAULT_MAPPINGS_PATH = join('data', 'mappings.json');

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonFileStore<T> implements DocumentStore<T> {
  readonly location: string;
  private schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private createEmpty: () => T;

  constructor(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, createEmpty: () => T) {
    this.location = filePath;
    this.schema = schema;
    this.createEmpty = createEmpty;
  }

  async load(): Promise<LoadResult<T>> {
    let raw: string;
    try {
      raw = await readFile(this.location, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return { ok: true, value: this.createEmpty(), created: true };
      }
      return this.failedLoad(err);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      return this.failedLoad(err);
    }

    const parsed = this.schema.safeParse(data);
    if (!parsed.success) {
      return this.failedLoad(new Error(`invalid document\n${formatZodError(parsed.error)}`));
    }
    return { ok: true, value: parsed.data, created: false };
  }

  async save(value: T): Promise<void> {
    const dir = dirname(this.location);
    const tmpPath = join(dir, `.${basename(this.location)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await mkdir(dir, { recursive: true });
      await this.writeThroughTemp(tmpPath, value);
    } catch (err) {
      throw new PersistError('save', this.location, err);
    }
  }

  private async writeThroughTemp(tmpPath: string, value: T): Promise<void> {
    try {
      await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
      await rename(tmpPath, this.location);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  private failedLoad(cause: unknown): LoadResult<T> {
    return { ok: false, value: this.createEmpty(), error: new PersistError('load', this.location, cause) };
  }
}

export function createLedgerFileStore(filePath: string = DEFAULT_LEDGER_PATH): JsonFileStore<LedgerDocument> {
  return new JsonFileStore(filePath, LedgerDocumentSchema, () => ({ members: {} }));
}

export function createMappingFileStore(filePath: string = DEFAULT_MAPPINGS_PATH): JsonFileStore<MappingDocument> {
  return new JsonFileStore(filePath, MappingDocumentSchema, () => []);
}
