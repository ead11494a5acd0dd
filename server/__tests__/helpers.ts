import { vi } from "vitest";
import type { InsertPrecedent } from "@shared/schema";
import { openDatabase, type DatabaseHandle } from "../db";
import { DatabaseStorage, type IStorage } from "../storage";

export interface TestStore {
  database: DatabaseHandle;
  storage: DatabaseStorage;
}

export async function createTestStore(records: InsertPrecedent[] = []): Promise<TestStore> {
  const database = openDatabase(":memory:");
  const storage = new DatabaseStorage(database.db);
  for (const record of records) {
    await storage.createPrecedent(record);
  }
  return { database, storage };
}

/** A storage whose every method is a bare spy, for asserting the store is never reached. */
export function spyStorage(): IStorage {
  return {
    createPrecedent: vi.fn(),
    getPrecedent: vi.fn(),
    deletePrecedent: vi.fn(),
    listPrecedents: vi.fn(),
    countPrecedents: vi.fn(),
    searchPrecedents: vi.fn(),
    getStats: vi.fn(),
    seedSamplePrecedents: vi.fn(),
  };
}

export const KESAVANANDA: InsertPrecedent = {
  title: "Kesavananda Bharati v. State of Kerala",
  caseNumber: "WP(C) 135/1970",
  year: 1973,
  court: "Supreme Court of India",
  description: "Parliament cannot alter the basic structure of the Constitution.",
  keywords: "basic structure, constitutional amendments",
  article: "Article 368",
};

export const CARLILL: InsertPrecedent = {
  title: "Carlill v. Carbolic Smoke Ball Co",
  caseNumber: "[1893] 1 QB 256",
  year: 1893,
  court: "Court of Appeal",
  description: "Unilateral offer made to the world at large.",
  keywords: "contract, offer, acceptance",
};

export const DONOGHUE: InsertPrecedent = {
  title: "Donoghue v. Stevenson",
  caseNumber: "[1932] AC 562",
  year: 1932,
  court: "House of Lords",
  description: "The maker of a product owes a duty of care to the ultimate consumer.",
  keywords: "negligence, duty of care",
};

export const ADAMS: InsertPrecedent = {
  title: "Adams v. Lindsell",
  caseNumber: "(1818) 1 B & Ald 681",
  year: 1818,
  court: "King's Bench",
  description: "Postal rule for acceptance of an offer.",
  keywords: "contract, postal rule",
};

export const TRANSFER_REFERENCE: InsertPrecedent = {
  title: "Transfer Act Reference",
  caseNumber: "REF-2001-7",
  year: 2001,
  court: "High Court",
  description: "Interpretation of registration requirements.",
  keywords: "",
  section: "Transfer of Property Act",
};

export const MARBURY: InsertPrecedent = {
  title: "Marbury v. Madison",
  caseNumber: "1803-SC-001",
  year: 1803,
  court: "Supreme Court",
  description: "Established judicial review in the United States.",
  keywords: "judicial review, constitutional law",
};

export const CATALOGUE: InsertPrecedent[] = [KESAVANANDA, CARLILL, DONOGHUE, ADAMS, TRANSFER_REFERENCE];
