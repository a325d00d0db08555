/**
 * Runtime Environment Configuration
 *
 * Resolved once from the process environment:
 * - NODE_ENV=production marks a production run
 * - TENPIN_APP_TITLE overrides the title printed by the demo runner
 * - TENPIN_DEBUG enables debug logging (on by default under NODE_ENV=development)
 */

import { Environment, EnvironmentSource } from "./types.js";

const DEFAULT_APP_TITLE = "Ten-Pin Score";

export const parseBooleanFlag = (rawValue: string | undefined, fallback: boolean): boolean => {
  if (typeof rawValue !== "string") {
    return fallback;
  }
  const normalized = rawValue.trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
};

export function resolveEnvironment(source: EnvironmentSource = process.env): Environment {
  const nodeEnv = source.NODE_ENV?.trim().toLowerCase();

  return {
    production: nodeEnv === "production",
    appTitle: source.TENPIN_APP_TITLE?.trim() || DEFAULT_APP_TITLE,
    debug: parseBooleanFlag(source.TENPIN_DEBUG, nodeEnv === "development"),
  };
}

export const environment: Environment = resolveEnvironment();
