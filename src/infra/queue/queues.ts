/**
 * BullMQ uses colons inside its Redis keys, so queue names stay hyphenated.
 */
export const RESEARCH_QUEUE = "research-reports";
