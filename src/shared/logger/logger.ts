import pino from "pino";

const levelFor = (nodeEnv: string | undefined): string => {
  if (nodeEnv === "production") {
    return "info";
  }

  return nodeEnv === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "research-report-engine",
  level: levelFor(process.env.NODE_ENV),
});

export type ErrorDetails = {
  name?: string;
  message: string;
  stack?: string;
};

export const toErrorDetails = (error: unknown): ErrorDetails => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
