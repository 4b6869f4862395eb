import pino from "pino";
import { config } from "../config";

export const logger = pino({ name: "pocket-quest", level: config.logLevel });

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { message: String(error) };
}
