import { ParserErrors } from '@chartscript/constants';
import type { RenderedChart } from './types';

export interface RasterRequest {
  svg: string;
  width: number;
  height: number;
  fontFamily: string;
}

/**
 * Turns SVG markup into encoded image bytes. No implementation ships with
 * this package; callers plug in their own.
 */
export interface Rasterizer {
  rasterize(request: RasterRequest): Promise<Uint8Array>;
}

export type RasterStage = 'parse' | 'render';

/**
 * A rasterizer could not read the SVG (`parse`) or draw it (`render`).
 */
export class RasterizationError extends Error {
  readonly code = 'RASTERIZATION_ERROR';

  constructor(
    readonly stage: RasterStage,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(stage === 'parse' ? ParserErrors.RASTER_PARSE(detail) : ParserErrors.RASTER_RENDER(detail), options);
    this.name = 'RasterizationError';
  }
}

/**
 * Rasterize a rendered chart at its own size. Failures that are not already
 * a `RasterizationError` are reported as render failures.
 */
export async function rasterizeDocument(
  rendered: RenderedChart,
  rasterizer: Rasterizer,
  fontFamily: string,
): Promise<Uint8Array> {
  try {
    return await rasterizer.rasterize({
      svg: rendered.svg,
      width: rendered.width,
      height: rendered.height,
      fontFamily,
    });
  } catch (error) {
    if (error instanceof RasterizationError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new RasterizationError('render', detail, { cause: error });
  }
}
