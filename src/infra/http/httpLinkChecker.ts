import type { VerifiedLink } from "../../core/entities/research";
import type { LinkCheckerPort } from "../../core/ports/outboundPorts";
import { logger, toErrorDetails } from "../../shared/logger/logger";

/**
 * HEAD-based reachability check. Redirects are followed; any status below 400
 * counts as working and every exception as broken.
 */
export class HttpLinkChecker implements LinkCheckerPort {
  constructor(private readonly timeoutMs: number) {}

  async check(url: string): Promise<VerifiedLink> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "HEAD",
        redirect: "follow",
        signal: controller.signal,
      });

      return {
        url,
        status: response.status < 400 ? "working" : "broken",
        httpStatus: response.status,
      };
    } catch (error) {
      logger.debug({ url, error: toErrorDetails(error) }, "Link check failed");
      return { url, status: "broken" };
    } finally {
      clearTimeout(timeout);
    }
  }
}
