import type { ChartConfig } from '@chartscript/parser';
import type { LayoutContext } from './layout/context';
import { TextMeasurer } from './text-metrics';
import { DEFAULT_FONT_FAMILY, DEFAULT_HEIGHT, DEFAULT_WIDTH } from './themes/default';
import { ThemeVariables } from './themes/variables';
import type { RenderOptions } from './types';

export interface ResolvedRender {
  layout: LayoutContext;
  fontFamily: string;
}

/**
 * Apply option defaults and the config width override.
 */
export function resolveRender(
  config: ChartConfig | undefined,
  options: RenderOptions,
  defaultPalette: readonly string[],
): ResolvedRender {
  return {
    layout: {
      width: config?.width ?? options.width ?? DEFAULT_WIDTH,
      height: options.height ?? DEFAULT_HEIGHT,
      measurer: new TextMeasurer(options.metrics, options.font),
      variables: ThemeVariables.from(config, options.logger),
      palette: options.palette ?? defaultPalette,
      logger: options.logger,
    },
    fontFamily: options.fontFamily ?? DEFAULT_FONT_FAMILY,
  };
}
