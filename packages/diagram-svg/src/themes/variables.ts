import type { AppLogObj, Logger } from '@chartscript/logger';
import type { ChartConfig } from '@chartscript/parser';

const FONT_SIZE_PATTERN = /^(\d+(?:\.\d+)?)(?:px)?$/;

/**
 * Typed read access to a chart's flattened theme variables.
 */
export class ThemeVariables {
  constructor(
    private readonly variables: ReadonlyMap<string, string> = new Map(),
    private readonly logger?: Logger<AppLogObj>,
  ) {}

  static from(config: ChartConfig | undefined, logger?: Logger<AppLogObj>): ThemeVariables {
    return new ThemeVariables(config?.themeVariables, logger);
  }

  get(key: string): string | undefined {
    return this.variables.get(key);
  }

  string(key: string, fallback: string): string {
    return this.variables.get(key) ?? fallback;
  }

  /**
   * A pixel size written as `25` or `25px`. Anything else falls back to the
   * default with a warning.
   */
  fontSize(key: string, fallback: number): number {
    const raw = this.variables.get(key);
    if (raw === undefined) {
      return fallback;
    }
    const match = FONT_SIZE_PATTERN.exec(raw.trim());
    if (!match?.[1]) {
      this.logger?.warn(`Invalid font size '${raw}' for ${key}, using default ${fallback}px`);
      return fallback;
    }
    return Number.parseFloat(match[1]);
  }

  /**
   * Entry `index` of a comma-separated list variable, trimmed.
   */
  listItem(key: string, index: number): string | undefined {
    const raw = this.variables.get(key);
    if (raw === undefined) {
      return undefined;
    }
    return raw.split(',').map((entry) => entry.trim())[index];
  }
}
