import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  level: appConfig.LOG_LEVEL
});

export function maskApiKey(apiKey: string): string {
  if (!apiKey || apiKey.length < 8) {
    return "****";
  }
  return `${apiKey.slice(0, 4)}****${apiKey.slice(-4)}`;
}
