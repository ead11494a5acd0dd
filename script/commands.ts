import { parseArgs } from "util";
import type { Precedent } from "@shared/schema";
import { INVALID_QUERY_MESSAGE, INVALID_YEAR_MESSAGE, errorMessage } from "../server/errors";
import { MIN_QUERY_LENGTH, parseInteger, sanitizeSearchQuery } from "../server/searchUtils";
import type { IStorage } from "../server/storage";

export type Print = (line: string) => void;

const OK = "✓";
const FAIL = "✗";

export const USAGE = [
  "usage: manage <command> [options]",
  "",
  "Precedent Finder - Database Management Tool",
  "",
  "commands:",
  "  add --title T --case-number N --year Y --court C --description D [--keywords K] [--section S] [--article A]",
  "                    Add a new precedent",
  "  list              List all precedents",
  "  delete <id>       Delete a precedent",
  "  search <query>    Search precedents",
  "  seed              Load the sample precedents into an empty database",
].join("\n");

const ADD_OPTIONS = {
  title: { type: "string" },
  "case-number": { type: "string" },
  year: { type: "string" },
  court: { type: "string" },
  description: { type: "string" },
  keywords: { type: "string", default: "" },
  section: { type: "string" },
  article: { type: "string" },
} as const;

const REQUIRED_ADD_OPTIONS = ["title", "case-number", "year", "court", "description"] as const;

function truncate(value: string, width: number, keep: number): string {
  return value.length > width ? value.slice(0, keep) + "..." : value;
}

export function formatPrecedentTable(rows: Precedent[]): string[] {
  const lines = [
    "",
    `${"ID".padEnd(5)} ${"Title".padEnd(30)} ${"Year".padEnd(6)} ${"Court".padEnd(20)}`,
    "-".repeat(65),
  ];
  for (const p of rows) {
    const title = truncate(p.title, 30, 27);
    lines.push(`${String(p.id).padEnd(5)} ${title.padEnd(30)} ${String(p.year).padEnd(6)} ${p.court.padEnd(20)}`);
  }
  lines.push("", `Total: ${rows.length} precedents`);
  return lines;
}

export function formatPrecedentDetail(p: Precedent): string[] {
  return [
    `Title: ${p.title}`,
    `Case #: ${p.caseNumber}`,
    `Year: ${p.year}`,
    `Court: ${p.court}`,
    `Description: ${p.description.slice(0, 100)}...`,
    `Keywords: ${p.keywords ?? ""}`,
    "-".repeat(60),
  ];
}

async function addCommand(args: string[], storage: IStorage, print: Print) {
  const { values } = parseArgs({ args, options: ADD_OPTIONS, strict: true });

  const missing = REQUIRED_ADD_OPTIONS.filter((name) => !values[name]);
  if (missing.length > 0) {
    print(`${FAIL} Missing required options: ${missing.map((name) => `--${name}`).join(", ")}`);
    return;
  }

  const title = values.title ?? "";
  try {
    const year = parseInteger(values.year);
    if (year === undefined) throw new Error(INVALID_YEAR_MESSAGE);

    await storage.createPrecedent({
      title,
      caseNumber: values["case-number"] ?? "",
      year,
      court: values.court ?? "",
      description: values.description ?? "",
      keywords: values.keywords,
      section: values.section ?? null,
      article: values.article ?? null,
    });
    print(`${OK} Successfully added precedent: ${title}`);
  } catch (error) {
    print(`${FAIL} Error adding precedent: ${errorMessage(error)}`);
  }
}

async function listCommand(storage: IStorage, print: Print) {
  const rows = await storage.listPrecedents();
  if (rows.length === 0) {
    print("No precedents found in database.");
    return;
  }
  formatPrecedentTable(rows).forEach((line) => print(line));
}

async function deleteCommand(args: string[], storage: IStorage, print: Print) {
  const { positionals } = parseArgs({ args, allowPositionals: true, strict: true });
  const [rawId = ""] = positionals;
  const id = parseInteger(rawId);
  if (id === undefined) {
    print(`${FAIL} Invalid precedent ID: ${rawId}`);
    return;
  }

  try {
    const deleted = await storage.deletePrecedent(id);
    if (!deleted) {
      print(`${FAIL} Precedent with ID ${id} not found.`);
      return;
    }
    print(`${OK} Successfully deleted precedent: ${deleted.title}`);
  } catch (error) {
    print(`${FAIL} Error deleting precedent: ${errorMessage(error)}`);
  }
}

async function searchCommand(args: string[], storage: IStorage, print: Print) {
  const { positionals } = parseArgs({ args, allowPositionals: true, strict: true });
  const query = sanitizeSearchQuery(positionals.join(" "));
  if (query.length < MIN_QUERY_LENGTH) {
    print(`${FAIL} ${INVALID_QUERY_MESSAGE}`);
    return;
  }

  const { rows } = await storage.searchPrecedents({ text: query, sort: "year", order: "desc" });
  if (rows.length === 0) {
    print(`No results found for: ${query}`);
    return;
  }

  print("");
  print(`Found ${rows.length} result(s) for '${query}':`);
  print("");
  for (const row of rows) {
    formatPrecedentDetail(row).forEach((line) => print(line));
  }
}

async function seedCommand(storage: IStorage, print: Print) {
  const added = await storage.seedSamplePrecedents();
  print(added > 0
    ? `${OK} Database initialized with ${added} sample precedents.`
    : "Database already contains precedents; nothing to seed.");
}

export async function runManage(argv: string[], storage: IStorage, print: Print = console.log): Promise<void> {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case "add":
        return await addCommand(args, storage, print);
      case "list":
        return await listCommand(storage, print);
      case "delete":
        return await deleteCommand(args, storage, print);
      case "search":
        return await searchCommand(args, storage, print);
      case "seed":
        return await seedCommand(storage, print);
      default:
        print(USAGE);
    }
  } catch (error) {
    // parseArgs rejects unknown or malformed options with a TypeError
    if (error instanceof TypeError && "code" in error && typeof error.code === "string" && error.code.startsWith("ERR_PARSE_ARGS")) {
      print(`${FAIL} ${error.message}`);
      return;
    }
    throw error;
  }
}
