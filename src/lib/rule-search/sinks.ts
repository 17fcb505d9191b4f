import * as fs from 'node:fs/promises';

import type { OutputTarget, RuleLine } from '../../config/types.js';
import { stripLineTerminator } from '../fs-helpers/read-lines.js';
import type { Logger } from '../logger.js';

export interface RuleSink {
  write: (line: RuleLine) => Promise<void>;
  close: () => Promise<void>;
}

/** Logs each matched line at `info`, without its line terminator. */
export function createConsoleSink(logger: Logger): RuleSink {
  return {
    write: async (line) => {
      logger.info(stripLineTerminator(line));
    },
    close: async () => {},
  };
}

export interface CollectingSink extends RuleSink {
  readonly lines: readonly RuleLine[];
}

export function createCollectingSink(): CollectingSink {
  const lines: RuleLine[] = [];
  return {
    lines,
    write: async (line) => {
      lines.push(line);
    },
    close: async () => {},
  };
}

/**
 * Append-only file sink shared by every chunk of a run.
 *
 * Writes go through a single queue, so each line lands whole and lines from
 * one caller keep their order. The file is opened in append mode on the
 * first write. A failed write rejects that call only; later writes still run.
 */
export class FileSink implements RuleSink {
  private handle: Promise<fs.FileHandle> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(readonly path: string) {}

  write(line: RuleLine): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error(`File sink is closed: ${this.path}`));
    }

    const task = this.tail.then(async () => {
      const handle = await this.open();
      await handle.appendFile(line, 'utf-8');
    });
    // The caller observes the failure through `task`
    this.tail = task.catch(() => undefined);
    return task;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.tail;
    if (!this.handle) return;
    const pending = this.handle;
    this.handle = null;
    const handle = await pending.catch(() => null);
    await handle?.close();
  }

  private open(): Promise<fs.FileHandle> {
    this.handle ??= fs.open(this.path, 'a');
    return this.handle;
  }
}

export function createRuleSink(target: OutputTarget, logger: Logger): RuleSink {
  switch (target.kind) {
    case 'console':
      return createConsoleSink(logger);
    case 'file':
      return new FileSink(target.path);
  }
}
