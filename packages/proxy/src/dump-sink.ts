import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { OutgoingSnapshot } from "@native-tool-adapter/core";
import type { Logger } from "./types.js";

function fileTimestamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, "-");
}

/**
 * Writes what each request sends to the backend into
 * `<directory>/<timestamp>-<n>.json`. Writes are queued; `flush` waits for
 * them. A failed write is logged and does not affect the request.
 */
export class DumpSink {
  private readonly directory: string;
  private readonly logger: Pick<Logger, "warn">;
  private readonly now: () => Date;
  private sequence = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    directory: string,
    options: { logger?: Pick<Logger, "warn">; now?: () => Date } = {}
  ) {
    this.directory = directory;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  record(snapshot: OutgoingSnapshot): void {
    this.sequence += 1;
    const file = join(
      this.directory,
      `${fileTimestamp(this.now())}-${this.sequence}.json`
    );
    const body = JSON.stringify(snapshot, null, 2);
    this.pending = this.pending
      .then(() => mkdir(this.directory, { recursive: true }))
      .then(() => writeFile(file, body))
      .catch((error: unknown) => {
        this.logger.warn(`[dump] Could not write ${file}`, error);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }
}
