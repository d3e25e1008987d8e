import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { MarketData, ResearchRequest } from "../../core/entities/research";
import type { ClockPort, LlmPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { parseMarketData } from "../parsing/companyExtractor";
import { dataCollectionPrompt } from "../prompts/researchPrompts";
import type { StageProgress } from "./progressReporter";

/**
 * First stage: asks the model for companies matching the request and parses them.
 */
export class MarketDataService {
  constructor(
    private readonly llm: LlmPort,
    private readonly clock: ClockPort,
    private readonly language: string,
  ) {}

  async collect(
    request: ResearchRequest,
    progress: StageProgress,
  ): Promise<Result<MarketData, AppBoundaryError>> {
    await progress(10, "Preparing market data request...");
    const prompt = dataCollectionPrompt(request, this.language);

    await progress(30, "Collecting market data from the model...");
    const response = await this.llm.generate(prompt, {
      temperature: 0.7,
      maxTokens: 2048,
    });

    if (response.isErr()) {
      return err(response.error);
    }

    await progress(70, "Extracting companies...");
    const marketData = parseMarketData(
      response.value,
      request.kind,
      this.clock.now(),
    );

    logger.info(
      { companies: marketData.totalFound, chars: response.value.length },
      "Market data collected",
    );
    await progress(90, `Found ${marketData.totalFound} companies`);

    return ok(marketData);
  }
}
