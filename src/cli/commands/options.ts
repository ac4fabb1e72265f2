/**
 * Helpers for commander option bags
 */

import { logger } from "../../lib/logger.js";

export function configureLogging(options: Record<string, unknown>): void {
  if (options["quiet"] === true) {
    logger.configure({ level: "error" });
  } else if (options["verbose"] === true) {
    logger.configure({ level: "debug" });
  }
}

export function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Numeric flag; a value that is not a number stays NaN so config
 * validation reports it
 */
export function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = stringOption(options, key);
  return value === undefined ? undefined : Number(value);
}

export function commaList(options: Record<string, unknown>, key: string): string[] | undefined {
  const value = stringOption(options, key);
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
