import { mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";
import { z } from "zod";

import type { PlanSnapshot } from "@wattplan/domain";
import { planSnapshotSchema } from "@wattplan/domain";

const IN_MEMORY = ":memory:";

export interface PlanRecord {
  id: number;
  timestamp: string;
  payload: PlanSnapshot;
}

export interface SocObservation {
  timestamp: string;
  socWh: number;
}

const planRowSchema = z.object({
  id: z.number(),
  timestamp: z.string(),
  payload: z.string(),
});

const socRowSchema = z.object({
  timestamp: z.string(),
  soc_wh: z.number(),
});

@Injectable()
export class StorageService implements OnModuleDestroy {
  private readonly dbPath: string;
  private readonly db: Database;
  private readonly logger = new Logger(StorageService.name);

  constructor() {
    const override = process.env.WATTPLAN_STORAGE_PATH?.trim();
    if (override === IN_MEMORY) {
      this.dbPath = IN_MEMORY;
    } else {
      const resolvedPath = override && override.length > 0
        ? resolve(process.cwd(), override)
        : join(process.cwd(), "data", "wattplan.sqlite");
      mkdirSync(dirname(resolvedPath), {recursive: true});
      this.dbPath = resolvedPath;
    }
    this.db = new DatabaseConstructor(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
    }
    this.migrate();
    this.logger.log(`Storage initialised at ${this.dbPath}`);
  }

  onModuleDestroy(): void {
    this.db.close();
    this.logger.verbose("Storage connection closed");
  }

  replacePlan(payload: PlanSnapshot): void {
    this.logger.log(`Replacing latest plan with timestamp ${payload.timestamp}`);
    const deleteStmt = this.db.prepare("DELETE FROM plans");
    const insertStmt = this.db.prepare("INSERT INTO plans (timestamp, payload) VALUES (?, ?)");
    const txn = this.db.transaction(() => {
      deleteStmt.run();
      insertStmt.run(payload.timestamp, JSON.stringify(payload));
    });
    txn();
  }

  getLatestPlan(): PlanRecord | null {
    this.logger.verbose("Fetching latest plan from storage");
    const row = this.db.prepare("SELECT id, timestamp, payload FROM plans ORDER BY timestamp DESC LIMIT 1").get();
    if (row === undefined) {
      return null;
    }
    const parsed = planRowSchema.parse(row);
    return {
      id: parsed.id,
      timestamp: parsed.timestamp,
      payload: planSnapshotSchema.parse(JSON.parse(parsed.payload)),
    };
  }

  /** Keeps only the most recent observation. */
  recordSoc(observation: SocObservation): void {
    const deleteStmt = this.db.prepare("DELETE FROM soc_observations");
    const insertStmt = this.db.prepare("INSERT INTO soc_observations (timestamp, soc_wh) VALUES (?, ?)");
    const txn = this.db.transaction(() => {
      deleteStmt.run();
      insertStmt.run(observation.timestamp, observation.socWh);
    });
    txn();
  }

  getLastObservedSoc(): SocObservation | null {
    const row = this.db
      .prepare("SELECT timestamp, soc_wh FROM soc_observations ORDER BY id DESC LIMIT 1")
      .get();
    if (row === undefined) {
      return null;
    }
    const parsed = socRowSchema.parse(row);
    return {timestamp: parsed.timestamp, socWh: parsed.soc_wh};
  }

  private migrate(): void {
    this.logger.verbose("Ensuring storage schema is up to date");
    this.db.exec(`
        CREATE TABLE IF NOT EXISTS plans
        (
            id        INTEGER PRIMARY KEY AUTOINCREMENT,
            timestamp TEXT NOT NULL,
            payload   TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_plans_timestamp ON plans (timestamp DESC);
    `);

    this.db.exec(`
        CREATE TABLE IF NOT EXISTS soc_observations
        (
            id        INTEGER PRIMARY KEY AUTOINCREMENT,
            timestamp TEXT NOT NULL,
            soc_wh    REAL NOT NULL
        );
    `);
  }
}
