/**
 * Environment Configuration Types
 */

export interface Environment {
  production: boolean;
  appTitle: string; // shown by the demo runner
  debug: boolean;
}

export type EnvironmentSource = Record<string, string | undefined>;
