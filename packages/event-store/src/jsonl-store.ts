/**
 * @starkexit/event-store: File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before it is indexed
 * - A torn final line (partial write) is cut from the file on load, and
 *   a missing final newline restored, so the next append starts clean
 * - Any other unreadable line, or a broken hash chain, refuses to load:
 *   the log backs the claims ledger, so silently dropping a line could
 *   re-open a paid claim
 *
 * File format:
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  ftruncateSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@starkexit/types";
import { InMemoryEventStore } from "./in-memory-store.js";
import type { StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";

/**
 * Options for creating a JsonlEventStore.
 */
export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 */
export class JsonlEventStore extends InMemoryEventStore {
  private readonly _filePath: string;

  /**
   * If the file exists, events are loaded from it. Otherwise it is
   * created on first append. The parent directory is created if needed.
   *
   * @throws EventStoreError CORRUPT_LOG if the file cannot be trusted
   */
  constructor(options: JsonlEventStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override persist(events: readonly StoredEvent[]): void {
    const data = events.map((e) => JSON.stringify(e)).join("\n") + "\n";
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const text = readFileSync(this._filePath, "utf-8");
    const lines = text.split("\n");
    let last = lines.length - 1;
    while (last >= 0 && lines[last]?.trim().length === 0) last -= 1;

    // Byte offset where the torn line starts, if there is one
    let tornAt: number | undefined;
    let offset = 0;
    for (const [index, line] of lines.entries()) {
      const start = offset;
      offset += Buffer.byteLength(line, "utf-8") + 1;
      if (line.trim().length === 0) continue;

      const record = parseRecord(line);
      if (record === undefined) {
        if (index === last) {
          tornAt = start;
          continue;
        }
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Unreadable event at line ${index + 1} of ${this._filePath}`,
        );
      }
      this.restore(record);
    }

    const integrity = this.verifyIntegrity();
    if (!integrity.valid) {
      const first = integrity.errors[0];
      throw new EventStoreError(
        "CORRUPT_LOG",
        `Hash chain broken in ${this._filePath}: ${first?.reason ?? "unknown"}`,
      );
    }

    if (tornAt !== undefined) {
      this._truncate(tornAt);
    } else if (text.length > 0 && !text.endsWith("\n")) {
      appendFileSync(this._filePath, "\n", "utf-8");
    }
  }

  private _truncate(length: number): void {
    const fd = openSync(this._filePath, "r+");
    try {
      ftruncateSync(fd, length);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

function parseRecord(line: string): StoredEvent | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }

  if (raw === null || typeof raw !== "object") return undefined;
  const r = raw as Record<string, unknown>;

  if (
    !isDomainEvent(r.event) ||
    typeof r.streamId !== "string" ||
    typeof r.version !== "number" ||
    typeof r.globalPosition !== "number" ||
    typeof r.appendedAt !== "string" ||
    typeof r.hash !== "string" ||
    typeof r.previousHash !== "string"
  ) {
    return undefined;
  }

  return {
    event: r.event,
    streamId: r.streamId,
    version: r.version,
    globalPosition: r.globalPosition,
    appendedAt: r.appendedAt,
    hash: r.hash,
    previousHash: r.previousHash,
  };
}
