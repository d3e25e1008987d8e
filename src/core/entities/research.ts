export type ResearchKind = "feature" | "product";

type ResearchRequestBase = {
  productDescription: string;
  segment: string;
  requiredPlayers: string;
  requiredCountries: string;
};

export type FeatureResearchRequest = ResearchRequestBase & {
  kind: "feature";
  researchElement: string;
  benchmarks: string;
};

export type ProductResearchRequest = ResearchRequestBase & {
  kind: "product";
  productCharacteristics: string;
};

export type ResearchRequest = FeatureResearchRequest | ProductResearchRequest;

export type StageName =
  | "data_collection"
  | "local_documents"
  | "case_analysis"
  | "report_generation";

export const stageOrder: readonly StageName[] = [
  "data_collection",
  "local_documents",
  "case_analysis",
  "report_generation",
];

export type StageStatus = "pending" | "active" | "completed" | "error";

export type StageState = {
  stage: StageName;
  status: StageStatus;
  progress: number;
  message: string;
  updatedAt: Date;
};

export type CompanyEntity = {
  name: string;
  website?: string;
  country?: string;
  characteristics?: string;
  links?: string[];
};

export type MarketData = {
  rawContent: string;
  companies: CompanyEntity[];
  kind: ResearchKind;
  collectedAt: Date;
  totalFound: number;
};

export type InsightMetrics = string | number | Record<string, unknown>;

export type InsightEntity = {
  sourceFile: string;
  downloadLink: string | null;
  section: string;
  fact: string;
  date: string | null;
  metrics: InsightMetrics | null;
  links: string[];
};

export type LocalInsights = {
  insights: InsightEntity[];
  files: string[];
  degradedReason?: string;
};

export type LinkStatus = "working" | "broken";

export type VerifiedLink = {
  url: string;
  status: LinkStatus;
  httpStatus?: number;
};

export type CaseEntity = {
  number: number;
  title: string;
  company?: string;
  website?: string;
  country?: string;
  description: string;
  links: string[];
  verifiedLinks?: VerifiedLink[];
  brokenLinks?: string[];
};

export type LinkVerificationSummary = {
  total: number;
  working: number;
  broken: number;
  workingPercentage: number;
};

/**
 * Carries the immutable request plus every stage artifact produced so far.
 */
export type ResearchContext = {
  readonly request: ResearchRequest;
  marketData?: MarketData;
  localInsights?: LocalInsights;
  cases?: CaseEntity[];
  report?: string;
  linkSummary?: LinkVerificationSummary;
};

export type ResearchReportEntity = {
  id: number;
  title: string;
  content: string;
  kind: ResearchKind;
  productDescription: string;
  segment: string;
  researchElement: string;
  benchmarks: string;
  requiredPlayers: string;
  requiredCountries: string;
  sessionId: string;
  aiModel: string;
  processingTimeSeconds: number;
  tokensUsed: number;
  createdAt: Date;
};

export type NewResearchReport = Omit<ResearchReportEntity, "id">;

export type ResearchSuccess = {
  success: true;
  report: string;
  reportId: number;
  stages: StageState[];
};

export type ResearchFailure = {
  success: false;
  error: string;
  stage?: StageName;
  stages: StageState[];
};

export type ResearchResult = ResearchSuccess | ResearchFailure;
