import { randomUUID } from "node:crypto";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { JSONFilePreset } from "lowdb/node";
import { logger } from "../logger.js";
import type { RunRecord } from "../schema/run.js";

type DbSchema = { runs: RunRecord[] };
type HistoryDb = Awaited<ReturnType<typeof JSONFilePreset<DbSchema>>>;

export type NewRunRecord = Omit<RunRecord, "id">;

export interface ListRunsOptions {
  testName?: string;
  limit?: number;
}

/** Append-only log of qfile outcomes kept in a JSON file. */
export class HistoryStore {
  private dbInstance: HistoryDb | null = null;

  constructor(private readonly filePath: string) {}

  private async getDb(): Promise<HistoryDb> {
    if (!this.dbInstance) {
      await mkdir(dirname(this.filePath), { recursive: true });
      const db = await JSONFilePreset<DbSchema>(this.filePath, { runs: [] });
      if (!Array.isArray(db.data.runs)) {
        db.data.runs = [];
      }
      this.dbInstance = db;
      logger.debug("Opened run history", "history", { path: this.filePath });
    }
    return this.dbInstance;
  }

  async recordRun(input: NewRunRecord): Promise<RunRecord> {
    const db = await this.getDb();
    const record: RunRecord = { id: `run_${randomUUID()}`, ...input };
    await db.update(({ runs }) => {
      runs.push(record);
    });
    return record;
  }

  /** Most recent first. */
  async listRuns(options: ListRunsOptions = {}): Promise<RunRecord[]> {
    const db = await this.getDb();
    await db.read();
    const runs = db.data.runs
      .filter((run) => options.testName === undefined || run.testName === options.testName)
      .slice()
      .reverse();
    return options.limit !== undefined ? runs.slice(0, options.limit) : runs;
  }

  async lastRun(testName: string): Promise<RunRecord | undefined> {
    const [latest] = await this.listRuns({ testName, limit: 1 });
    return latest;
  }
}
