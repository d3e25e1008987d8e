import {
  index,
  integer,
  pgTable,
  real,
  serial,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const researchReportsTable = pgTable(
  "research_reports",
  {
    id: serial("id").primaryKey(),
    title: text("title").notNull(),
    content: text("content").notNull(),
    researchType: text("research_type").$type<"feature" | "product">().notNull(),
    productDescription: text("product_description").notNull(),
    segment: text("segment").notNull(),
    researchElement: text("research_element").notNull(),
    benchmarks: text("benchmarks").notNull(),
    requiredPlayers: text("required_players").notNull(),
    requiredCountries: text("required_countries").notNull(),
    sessionId: text("session_id").notNull(),
    aiModel: text("ai_model").notNull(),
    processingTimeSeconds: real("processing_time_seconds").notNull(),
    tokensUsed: integer("tokens_used").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    sessionIdx: index("research_reports_session_idx").on(table.sessionId),
    createdIdx: index("research_reports_created_idx").on(table.createdAt),
  }),
);

export type ResearchReportRow = typeof researchReportsTable.$inferSelect;
