/**
 * Built-in colors and fonts. Palettes can be replaced per render through
 * `RenderOptions.palette`; individual colors through theme variables.
 */

export const DEFAULT_FONT_FAMILY = 'Liberation Sans';

export const DEFAULT_WIDTH = 800;
export const DEFAULT_HEIGHT = 600;

/** Slice colors when no `pie<n>` variable is set */
export const PIE_PALETTE: readonly string[] = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];

/** Series colors when `xyChart.plotColorPalette` does not cover the series */
export const XY_PALETTE: readonly string[] = [
  '#ff8b00',
  '#9c1de9',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];

/** Text, axis and arrow color of the XY and work item charts */
export const INK = '#131300';

export const GUIDE_LINE = '#e0e0e0';

export const BACKGROUND = 'white';

/**
 * Theme variable defaults of the pie chart.
 */
export const PIE_VARIABLES = {
  pieOpacity: '0.7',
  pieStrokeColor: 'black',
  pieOuterStrokeColor: 'black',
  pieSectionTextColor: 'black',
  pieStrokeWidth: '2px',
  pieOuterStrokeWidth: '2px',
  pieTitleTextColor: 'black',
  pieLegendTextColor: 'black',
} as const;

export const PIE_FONT_SIZES = {
  pieTitleTextSize: 25,
  pieSectionTextSize: 17,
  pieLegendTextSize: 17,
} as const;

export const XY_FONT_SIZES = {
  'xyChart.titleFontSize': 20,
  'xyChart.labelFontSize': 16,
  'xyChart.legendFontSize': 17,
} as const;

/** Fixed size of the y-axis title */
export const XY_AXIS_TITLE_FONT_SIZE = 16;

/** Fixed fonts of the work item movement chart */
export const WORK_ITEM_FONT_SIZES = {
  title: 20,
  column: 16,
  item: 14,
  circle: 16,
} as const;

/**
 * Pick `index` from a palette, wrapping around.
 */
export function paletteColor(palette: readonly string[], index: number): string {
  if (palette.length === 0) {
    return INK;
  }
  return palette[index % palette.length] ?? INK;
}
