import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { errorMessage } from '../common/errors';

/**
 * Runs detached background tasks and keeps a handle on each one so that
 * shutdown can wait for them instead of cutting a sync in half.
 */
@Injectable()
export class SyncTaskRunner implements OnApplicationShutdown {
  private readonly logger = new Logger(SyncTaskRunner.name);
  private readonly running = new Set<Promise<void>>();

  get size(): number {
    return this.running.size;
  }

  /** Starts `task` on a later turn of the event loop. */
  spawn(name: string, task: () => Promise<void>): void {
    const handle: Promise<void> = new Promise<void>((resolve) =>
      setImmediate(resolve),
    )
      .then(task)
      .catch((error: unknown) => {
        this.logger.error(
          `Background task ${name} failed: ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      })
      .finally(() => {
        this.running.delete(handle);
      });
    this.running.add(handle);
  }

  async drain(): Promise<void> {
    // Tasks may spawn other tasks while we wait
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running]);
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (this.running.size > 0) {
      this.logger.log(
        `Waiting for ${this.running.size} background task(s) before shutdown${signal ? ` (${signal})` : ''}`,
      );
    }
    await this.drain();
  }
}
