// src/core/checkpoint/CheckpointStore.ts

import { promises as fsPromises } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { Checkpoint, LaneCheckpoint } from './types';
import { emptyCheckpoint } from './types';
import { formatInstant, parseInstant } from './instant';
import type { Logger } from '../../observability/Logger';
import { CorruptStateError, PersistenceError, errorMessage, isErrnoException } from '../../utils/errors';

export const DEFAULT_STATE_PATH = 'state/state.json';

/** The slice of fs/promises the store touches; tests swap in failing calls */
export type CheckpointFileSystem = Pick<
  typeof fsPromises,
  'readFile' | 'mkdir' | 'open' | 'rename' | 'rm'
>;

const IdListSchema = z
  .array(
    z.union([
      z.number().int('must contain integers').refine(Number.isSafeInteger, 'must contain safe integers'),
      z
        .string()
        .trim()
        .regex(/^-?\d+$/, 'must contain integers')
        .transform(Number)
        .refine(Number.isSafeInteger, 'must contain safe integers'),
    ]),
    { invalid_type_error: 'must be a list' }
  )
  .default([]);

const InstantSchema = z
  .string({ invalid_type_error: 'must be an ISO 8601 string or null' })
  .nullable()
  .default(null)
  .transform((value, ctx) => {
    if (value === null) return null;
    try {
      return parseInstant(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
      return z.NEVER;
    }
  });

/**
 * On-disk layout. Unknown keys are dropped, missing lanes start empty.
 */
const CheckpointRecordSchema = z.object(
  {
    last_merged_at: InstantSchema,
    processed_pr_ids: IdListSchema,
    last_release_published_at: InstantSchema,
    processed_release_ids: IdListSchema,
  },
  { invalid_type_error: 'must contain a JSON object' }
);

type CheckpointRecord = z.input<typeof CheckpointRecordSchema>;

/**
 * Durable checkpoint record. `save` goes through a temp file in the same
 * directory, fsync and rename, so `load` sees either the previous record or
 * the new one, never a torn write.
 */
export class CheckpointStore {
  constructor(
    readonly path: string,
    private logger: Logger,
    private fs: CheckpointFileSystem = fsPromises
  ) {}

  /**
   * @throws {CorruptStateError} when a record exists but cannot be trusted
   * @throws {PersistenceError} when the file exists but cannot be read
   */
  async load(): Promise<Checkpoint> {
    let rawText: string;
    try {
      rawText = await this.fs.readFile(this.path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.info('No checkpoint yet, starting empty', { path: this.path });
        return emptyCheckpoint();
      }
      throw new PersistenceError(`Failed to read checkpoint file: ${this.path}`, {
        path: this.path,
        cause: errorMessage(error),
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawText);
    } catch (error) {
      throw new CorruptStateError(`Invalid JSON in checkpoint file: ${this.path}`, {
        path: this.path,
        cause: errorMessage(error),
      });
    }

    const parsed = CheckpointRecordSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new CorruptStateError(`Invalid checkpoint file ${this.path}: ${issues.join('; ')}`, {
        path: this.path,
        issues,
      });
    }

    const record = parsed.data;
    return {
      pullRequests: this.toLane(record.last_merged_at, record.processed_pr_ids, 'processed_pr_ids'),
      releases: this.toLane(
        record.last_release_published_at,
        record.processed_release_ids,
        'processed_release_ids'
      ),
    };
  }

  /**
   * @throws {PersistenceError} after removing the temp file
   */
  async save(checkpoint: Checkpoint): Promise<void> {
    const serialized = `${JSON.stringify(toRecord(checkpoint), null, 2)}\n`;
    const directory = path.dirname(this.path);
    const tempPath = path.join(directory, `.${path.basename(this.path)}.${uuidv4()}.tmp`);

    let handle: FileHandle | undefined;
    try {
      await this.fs.mkdir(directory, { recursive: true });
      handle = await this.fs.open(tempPath, 'w');
      await handle.writeFile(serialized, 'utf-8');
      await handle.sync();
      await handle.close();
      handle = undefined;
      await this.fs.rename(tempPath, this.path);
    } catch (error) {
      await this.discardTemp(handle, tempPath);
      throw new PersistenceError(`Failed to save checkpoint atomically: ${this.path}`, {
        path: this.path,
        cause: errorMessage(error),
      });
    }

    this.logger.debug('Checkpoint saved', { path: this.path });
  }

  private toLane(watermark: Date | null, ids: number[], field: string): LaneCheckpoint {
    if (watermark === null && ids.length > 0) {
      throw new CorruptStateError(
        `Invalid checkpoint file ${this.path}: ${field} must be empty while its timestamp is null`,
        { path: this.path, field }
      );
    }
    return { watermark, seenIds: new Set(ids) };
  }

  private async discardTemp(handle: FileHandle | undefined, tempPath: string): Promise<void> {
    // a handle whose close already failed rejects again; the rm must still run
    try {
      await handle?.close();
    } catch (closeError) {
      this.logger.debug('Temporary checkpoint file handle already closed', {
        path: tempPath,
        error: errorMessage(closeError),
      });
    }

    try {
      await this.fs.rm(tempPath, { force: true });
    } catch (cleanupError) {
      this.logger.warn('Failed to remove temporary checkpoint file', {
        path: tempPath,
        error: errorMessage(cleanupError),
      });
    }
  }
}

function toRecord(checkpoint: Checkpoint): CheckpointRecord {
  return {
    last_merged_at: serializeWatermark(checkpoint.pullRequests),
    processed_pr_ids: serializeIds(checkpoint.pullRequests),
    last_release_published_at: serializeWatermark(checkpoint.releases),
    processed_release_ids: serializeIds(checkpoint.releases),
  };
}

function serializeWatermark(lane: LaneCheckpoint): string | null {
  return lane.watermark ? formatInstant(lane.watermark) : null;
}

function serializeIds(lane: LaneCheckpoint): number[] {
  return Array.from(new Set(lane.seenIds)).sort((a, b) => a - b);
}
