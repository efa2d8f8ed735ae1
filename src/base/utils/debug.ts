/**
 * Debug configuration module
 * Controls debug output for the registry components
 *
 * Debug Levels:
 * - CAPREG_DEBUG=0 or unset: No debug output (default)
 * - CAPREG_DEBUG=1: Standard debug output (discovery summaries, skipped files)
 * - CAPREG_DEBUG=2: Verbose debug output (every accepted resource)
 */

export type DebugLevel = 0 | 1 | 2;

export type DebugComponent = 'skills' | 'subagents' | 'discovery' | 'config';

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean; // level >= 1
  verbose: boolean; // level >= 2
  components: Record<DebugComponent, DebugLevel>;
}

let cachedConfig: DebugConfig | null = null;

/**
 * Parse debug level from environment variable
 */
function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * CAPREG_DEBUG_<COMPONENT>=1|2 overrides the global level for one component.
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.CAPREG_DEBUG);

  cachedConfig = {
    level: globalLevel,
    enabled: globalLevel >= 1,
    verbose: globalLevel >= 2,
    components: {
      skills: parseDebugLevel(process.env.CAPREG_DEBUG_SKILLS) || globalLevel,
      subagents: parseDebugLevel(process.env.CAPREG_DEBUG_SUBAGENTS) || globalLevel,
      discovery: parseDebugLevel(process.env.CAPREG_DEBUG_DISCOVERY) || globalLevel,
      config: parseDebugLevel(process.env.CAPREG_DEBUG_CONFIG) || globalLevel,
    },
  };

  return cachedConfig;
}

/**
 * Check if verbose debug is enabled for a specific component (level >= 2)
 */
export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
