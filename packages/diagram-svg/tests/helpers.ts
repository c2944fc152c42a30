import { Logger } from '@chartscript/logger';
import type { AppLogObj } from '@chartscript/logger';
import type { LayoutContext } from '../src/layout/context';
import { type GlyphMetrics, TextMeasurer } from '../src/text-metrics';
import { ThemeVariables } from '../src/themes/variables';

/** 10px per character at any size; line height equals the pixel size. */
export const fixedMetrics: GlyphMetrics = {
  measureWidth: (text) => [...text].length * 10,
  measureHeight: (_font, pixelSize) => pixelSize,
};

export function layoutContext(
  width: number,
  height: number,
  palette: readonly string[],
  variables: Record<string, string> = {},
  logger?: Logger<AppLogObj>,
): LayoutContext {
  return {
    width,
    height,
    measurer: new TextMeasurer(fixedMetrics, new Uint8Array(1)),
    variables: new ThemeVariables(new Map(Object.entries(variables)), logger),
    palette,
    logger,
  };
}

export function createTestLogger() {
  const logs: Record<string, unknown>[] = [];
  const logger = new Logger<AppLogObj>({ name: 'test', type: 'hidden', minLevel: 0 });
  logger.attachTransport((logObj: Record<string, unknown>) => {
    logs.push(logObj);
  });
  return { logger, logs };
}

export function getMsg(logEntry: Record<string, unknown>): string {
  const message = logEntry['0'];
  return typeof message === 'string' ? message : '';
}
