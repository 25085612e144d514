import pino from "pino";

const defaultLevel = (): string => {
  if (process.env.NODE_ENV === "production") {
    return "info";
  }

  return process.env.NODE_ENV === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "market-digest",
  level: process.env.LOG_LEVEL ?? defaultLevel(),
});

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
