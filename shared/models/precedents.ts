import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const precedents = sqliteTable(
    "precedents",
    {
        id: integer("id").primaryKey({ autoIncrement: true }),
        title: text("title", { length: 255 }).notNull().unique(),
        caseNumber: text("case_number", { length: 100 }).notNull(),
        year: integer("year").notNull(),
        court: text("court", { length: 200 }).notNull(),
        description: text("description").notNull(),
        keywords: text("keywords", { length: 500 }),
        section: text("section"),   // statute / section cross reference
        article: text("article"),
        createdAt: text("created_at")
            .notNull()
            .$defaultFn(() => new Date().toISOString()),
        updatedAt: text("updated_at")
            .notNull()
            .$defaultFn(() => new Date().toISOString())
            .$onUpdateFn(() => new Date().toISOString()),
    },
    (table) => ({
        yearIdx: index("precedents_year_idx").on(table.year),
        courtIdx: index("precedents_court_idx").on(table.court),
    })
);

const nonBlank = (max?: number) => {
    const base = z.string().trim().min(1);
    return max ? base.max(max) : base;
};

export const insertPrecedentSchema = createInsertSchema(precedents)
    .omit({
        id: true,
        createdAt: true,
        updatedAt: true,
    })
    .extend({
        title: nonBlank(255),
        caseNumber: nonBlank(100),
        year: z.number().int().refine(Number.isSafeInteger, "Year must be a safe integer"),
        court: nonBlank(200),
        description: nonBlank(),
        keywords: z.string().max(500).nullish(),
        section: z.string().nullish(),
        article: z.string().nullish(),
    });

export type Precedent = typeof precedents.$inferSelect;
export type InsertPrecedent = z.infer<typeof insertPrecedentSchema>;
