import { desc, eq } from "drizzle-orm";
import type {
  NewResearchReport,
  ResearchReportEntity,
} from "../../core/entities/research";
import type { ReportRepositoryPort } from "../../core/ports/outboundPorts";
import type { Database } from "./client";
import { researchReportsTable, type ResearchReportRow } from "./schema";

export const toReportEntity = (row: ResearchReportRow): ResearchReportEntity => ({
  id: row.id,
  title: row.title,
  content: row.content,
  kind: row.researchType,
  productDescription: row.productDescription,
  segment: row.segment,
  researchElement: row.researchElement,
  benchmarks: row.benchmarks,
  requiredPlayers: row.requiredPlayers,
  requiredCountries: row.requiredCountries,
  sessionId: row.sessionId,
  aiModel: row.aiModel,
  processingTimeSeconds: row.processingTimeSeconds,
  tokensUsed: row.tokensUsed,
  createdAt: row.createdAt,
});

/**
 * Append-only report history; every run gets its own row.
 */
export class PostgresReportRepository implements ReportRepositoryPort {
  constructor(private readonly db: Database) {}

  async save(report: NewResearchReport): Promise<number> {
    const { kind, ...columns } = report;
    const [row] = await this.db
      .insert(researchReportsTable)
      .values({ ...columns, researchType: kind })
      .returning({ id: researchReportsTable.id });

    if (!row) {
      throw new Error("Report insert returned no id");
    }

    return row.id;
  }

  async findById(id: number): Promise<ResearchReportEntity | null> {
    const [row] = await this.db
      .select()
      .from(researchReportsTable)
      .where(eq(researchReportsTable.id, id))
      .limit(1);

    return row ? toReportEntity(row) : null;
  }

  async listRecent(limit: number): Promise<ResearchReportEntity[]> {
    const rows = await this.db
      .select()
      .from(researchReportsTable)
      .orderBy(desc(researchReportsTable.createdAt))
      .limit(limit);

    return rows.map(toReportEntity);
  }
}
