import { appendFile, mkdir, open, readFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuid } from "uuid";
import {
  ValidationError,
  isSessionRecord,
  silentLogger,
  validateRecordingEntryData,
  validateSessionRecordData,
} from "@gridswarm/schemas";
import type { Logger, RecordingEntry, SessionRecord } from "@gridswarm/schemas";
import { recordingFileName } from "./recording-name.js";
import { redactNote } from "./redact.js";

export interface RecorderOptions {
  dir: string;
  gameId: string;
  policy: string;
  maxActions: number;
  /** Known up front only for caller-assigned instances. */
  instanceId?: string;
  fsync?: boolean;
  /** Mask credentials in notes. SessionRecords are never altered. Default: true */
  redactNotes?: boolean;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Append-only JSONL log of one session. The file is created on the first
 * write once the instance id is known; lines are only ever appended, in the
 * order `record`/`note` were called.
 */
export class Recorder {
  private options: RecorderOptions;
  private logger: Logger;
  private writeLock: Promise<void> = Promise.resolve();
  private filePath?: string;
  private instanceId?: string;
  /** Notes written before the instance id was known. */
  private pending: string[] = [];
  private closed = false;

  constructor(options: RecorderOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.instanceId = options.instanceId;
  }

  /** Absolute path of the log, once it exists. */
  get path(): string | undefined {
    return this.filePath;
  }

  async record(record: SessionRecord): Promise<void> {
    const check = validateSessionRecordData(record);
    if (!check.valid) {
      throw new ValidationError(`Refusing to record an invalid step: ${check.errors.join(", ")}`);
    }
    this.instanceId ??= record.instance_id;
    await this.append(record);
  }

  /** Any entry that is not a step: scorecard snapshots, errors, policy notes. */
  async note(payload: Record<string, unknown>): Promise<void> {
    const data = this.options.redactNotes === false ? payload : redactNote(payload);
    await this.append(data);
  }

  /** Wait for pending writes. Buffered notes of a session that never got an instance id get a generated one. */
  async close(): Promise<void> {
    if (this.closed) return;
    if (this.pending.length > 0 && this.instanceId === undefined) {
      this.instanceId = `unassigned-${uuid()}`;
      this.logger.warn("No instance id was assigned; writing notes under a generated one", { instance_id: this.instanceId });
    }
    if (this.pending.length > 0) await this.append(undefined);
    await this.writeLock;
    this.closed = true;
  }

  private async append(data: unknown): Promise<void> {
    if (this.closed) throw new Error("Recorder is closed");

    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      if (data !== undefined) {
        const entry: RecordingEntry = { timestamp: (this.options.now?.() ?? new Date()).toISOString(), data };
        const validation = validateRecordingEntryData(entry);
        if (!validation.valid) {
          throw new ValidationError(`Invalid recording entry: ${validation.errors.join(", ")}`);
        }
        this.pending.push(JSON.stringify(entry));
      }
      if (this.instanceId === undefined) return;

      const filePath = await this.ensureFile(this.instanceId);
      const chunk = this.pending.map((line) => line + "\n").join("");
      const count = this.pending.length;
      if (count === 0) return;
      if (this.options.fsync) {
        const fh = await open(filePath, "a");
        try {
          await fh.write(chunk, undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(filePath, chunk, "utf-8");
      }
      // Only drop buffered lines after a successful write
      this.pending = [];
    } finally {
      releaseLock();
    }
  }

  private async ensureFile(instanceId: string): Promise<string> {
    if (this.filePath) return this.filePath;
    await mkdir(this.options.dir, { recursive: true });
    this.filePath = join(
      this.options.dir,
      recordingFileName({
        game_id: this.options.gameId,
        policy: this.options.policy,
        max_actions: this.options.maxActions,
        instance_id: instanceId,
      }),
    );
    this.logger.debug(`Recording to ${this.filePath}`);
    return this.filePath;
  }
}

/**
 * Read every entry of a recording. A torn last line, left by a crash mid-write,
 * is skipped; a malformed line anywhere else is an error.
 */
export async function readRecording(path: string, logger: Logger = silentLogger): Promise<RecordingEntry[]> {
  const content = await readFile(path, "utf-8");
  const lines = content.split("\n").filter((line) => line.trim() !== "");
  const entries: RecordingEntry[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      if (i === lines.length - 1) {
        logger.warn(`${path}: skipping incomplete last line`);
        break;
      }
      throw new ValidationError(`${path}:${i + 1}: not valid JSON`);
    }
    const check = validateRecordingEntryData(parsed);
    if (!check.valid || !isEntry(parsed)) {
      throw new ValidationError(`${path}:${i + 1}: ${check.errors.join(", ")}`);
    }
    entries.push(parsed);
  }
  return entries;
}

/** The SessionRecords of a recording, in order, without notes. */
export function recordedSteps(entries: readonly RecordingEntry[]): SessionRecord[] {
  const steps: SessionRecord[] = [];
  for (const entry of entries) {
    if (isSessionRecord(entry.data)) steps.push(entry.data);
  }
  return steps;
}

function isEntry(value: unknown): value is RecordingEntry {
  return typeof value === "object" && value !== null && "timestamp" in value && "data" in value;
}
