import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ObjectType } from '../../domain/entities/ObjectType.js';
import type { RunKind } from '../../domain/entities/QueueMessage.js';
import type { TimeWindow } from '../../domain/entities/TimeWindow.js';
import type { CheckpointPort } from '../../domain/ports/StoragePort.js';
import { Logger } from '../../shared/Logger.js';

const checkpointRow = z.object({ synced_at: z.string() });

export class CheckpointStore implements CheckpointPort {
  private readonly logger = new Logger('CheckpointStore');

  /** @param floor - 尚無 checkpoint 時的起始時間（config.startTime） */
  constructor(
    private readonly db: Database.Database,
    private readonly floor: string,
  ) {}

  getCheckpoint(objectType: ObjectType, currentTime: string): TimeWindow {
    const row: unknown = this.db.prepare(
      'SELECT synced_at FROM checkpoints WHERE object_type = ?'
    ).get(objectType);

    const parsed = checkpointRow.safeParse(row);
    if (!parsed.success) {
      this.logger.debug('No checkpoint found, using configured start time', { objectType, start: this.floor });
      return { start: this.floor, end: currentTime };
    }
    return { start: parsed.data.synced_at, end: currentTime };
  }

  setCheckpoint(objectType: ObjectType, time: string, runKind: RunKind): void {
    this.db.prepare(
      'INSERT OR REPLACE INTO checkpoints(object_type, synced_at, run_kind) VALUES(?, ?, ?)'
    ).run(objectType, time, runKind);
    this.logger.debug('Checkpoint updated', { objectType, time, runKind });
  }
}
