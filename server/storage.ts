import { asc, count, eq } from "drizzle-orm";
import { ZodError } from "zod";
import {
  precedents,
  insertPrecedentSchema,
  type InsertPrecedent,
  type Precedent,
} from "@shared/schema";
import type { AppDatabase } from "./db";
import { ValidationError } from "./errors";
import { buildPrecedentFilter, buildPrecedentOrder, type SearchCriteria } from "./searchUtils";
import { SAMPLE_PRECEDENTS } from "./seed";

export interface SearchRows {
  rows: Precedent[];
  /** Matches before limit/offset were applied */
  total: number;
}

export interface PrecedentStats {
  total: number;
  byYear: { year: number; count: number }[];
  byCourt: { court: string; count: number }[];
}

export interface IStorage {
  createPrecedent(input: InsertPrecedent): Promise<Precedent>;
  getPrecedent(id: number): Promise<Precedent | undefined>;
  deletePrecedent(id: number): Promise<Precedent | undefined>;
  listPrecedents(): Promise<Precedent[]>;
  countPrecedents(): Promise<number>;
  searchPrecedents(criteria: SearchCriteria): Promise<SearchRows>;
  getStats(): Promise<PrecedentStats>;
  seedSamplePrecedents(): Promise<number>;
}

function validateInsert(input: InsertPrecedent): InsertPrecedent {
  try {
    return insertPrecedentSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const [issue] = error.issues;
      throw new ValidationError(issue ? `${issue.path.join(".")}: ${issue.message}` : error.message);
    }
    throw error;
  }
}

function toRow(values: InsertPrecedent): typeof precedents.$inferInsert {
  const now = new Date().toISOString();
  return { ...values, keywords: values.keywords ?? "", createdAt: now, updatedAt: now };
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: AppDatabase) {}

  async createPrecedent(input: InsertPrecedent): Promise<Precedent> {
    const values = toRow(validateInsert(input));
    // A UNIQUE violation on title throws out of the transaction and rolls it back
    return this.db.transaction((tx) => {
      const [created] = tx
        .insert(precedents)
        .values(values)
        .returning()
        .all();
      if (!created) throw new Error("Insert returned no row");
      return created;
    });
  }

  async getPrecedent(id: number): Promise<Precedent | undefined> {
    const [result] = await this.db.select().from(precedents).where(eq(precedents.id, id));
    return result;
  }

  async deletePrecedent(id: number): Promise<Precedent | undefined> {
    return this.db.transaction((tx) =>
      tx.delete(precedents).where(eq(precedents.id, id)).returning().get(),
    );
  }

  async listPrecedents(): Promise<Precedent[]> {
    return this.db.select().from(precedents).orderBy(asc(precedents.id));
  }

  async countPrecedents(): Promise<number> {
    const row = this.db.select({ count: count() }).from(precedents).get();
    return row?.count ?? 0;
  }

  async searchPrecedents(criteria: SearchCriteria): Promise<SearchRows> {
    const where = buildPrecedentFilter(criteria);
    const orderBy = buildPrecedentOrder(criteria.sort, criteria.order);

    return this.db.transaction((tx) => {
      const totalRow = tx.select({ count: count() }).from(precedents).where(where).get();

      let query = tx.select().from(precedents).where(where).orderBy(...orderBy).$dynamic();
      if (criteria.limit !== undefined) {
        query = query.limit(criteria.limit).offset(criteria.offset ?? 0);
      }

      return { rows: query.all(), total: totalRow?.count ?? 0 };
    });
  }

  async getStats(): Promise<PrecedentStats> {
    return this.db.transaction((tx) => {
      const totalRow = tx.select({ count: count() }).from(precedents).get();
      const byYear = tx
        .select({ year: precedents.year, count: count() })
        .from(precedents)
        .groupBy(precedents.year)
        .orderBy(asc(precedents.year))
        .all();
      const byCourt = tx
        .select({ court: precedents.court, count: count() })
        .from(precedents)
        .groupBy(precedents.court)
        .orderBy(asc(precedents.court))
        .all();

      return { total: totalRow?.count ?? 0, byYear, byCourt };
    });
  }

  async seedSamplePrecedents(): Promise<number> {
    const samples = SAMPLE_PRECEDENTS.map(validateInsert);
    return this.db.transaction((tx) => {
      const existing = tx.select({ count: count() }).from(precedents).get();
      if ((existing?.count ?? 0) > 0) return 0;

      for (const sample of samples) {
        tx.insert(precedents).values(toRow(sample)).run();
      }
      return samples.length;
    });
  }
}
