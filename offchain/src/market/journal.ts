import { v4 as uuidv4 } from "uuid";
import { Queryable } from "../shared/db";
import { EventLog } from "../shared/events";
import { logger } from "../shared/logger";
import { MarketEvent } from "../shared/types";

/**
 * Appends every committed marketplace event to Postgres. Inserts are
 * chained so rows land in publish order.
 */
export class EventJournal {
  private tail: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;
  private failures = 0;

  constructor(private readonly db: Queryable) {}

  async createTables(): Promise<void> {
    await this.db.query(
      `CREATE TABLE IF NOT EXISTS market_events (
         id UUID PRIMARY KEY,
         name TEXT NOT NULL,
         data JSONB NOT NULL,
         created_at TIMESTAMPTZ NOT NULL
       )`,
    );
    await this.db.query(`CREATE INDEX IF NOT EXISTS market_events_name_idx ON market_events (name)`);
  }

  attach(log: EventLog): void {
    this.detach();
    this.unsubscribe = log.subscribe((event) => this.append(event));
  }

  detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  append(event: MarketEvent): void {
    this.tail = this.tail.then(() => this.insert(event));
  }

  /** Resolves once every queued insert has been attempted */
  flush(): Promise<void> {
    return this.tail;
  }

  failedInserts(): number {
    return this.failures;
  }

  private async insert(event: MarketEvent): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO market_events (id, name, data, created_at) VALUES ($1, $2, $3, $4)`,
        [uuidv4(), event.name, JSON.stringify(event.data), event.ts],
      );
    } catch (error) {
      this.failures += 1;
      logger.error("[JOURNAL] Failed to append event", {
        event: event.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
