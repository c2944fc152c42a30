import type { AppLogObj, Logger } from '@chartscript/logger';
import type { TextMeasurer } from '../text-metrics';
import type { ThemeVariables } from '../themes/variables';

/**
 * Everything a layout engine needs besides the chart itself.
 */
export interface LayoutContext {
  /** Canvas width after the config override */
  width: number;
  /** Requested canvas height */
  height: number;
  measurer: TextMeasurer;
  variables: ThemeVariables;
  palette: readonly string[];
  logger?: Logger<AppLogObj>;
}
