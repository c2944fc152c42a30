/**
 * Integration tests for chart SVG rendering
 */

import { parseChart } from '@chartscript/parser';
import { describe, expect, it } from 'vitest';
import { renderChart } from '../../src/render';
import { createTestLogger, getMsg } from '../helpers';

const PIE = 'pie showData title Pets\n"Dogs": 386\n"Cats": 85\n';

// Legend "Dogs [386]" is 150.1px wide, leaving a 256.455px radius
const UNTITLED_PIE = 'pie\n"Dogs": 386\n"Cats": 85\n';

const XY = [
  'xychart-beta',
  'title "Velocity"',
  'legend [Planned, Done]',
  'x-axis [S1, S2]',
  'y-axis "Points" 0 --> 40',
  'bar [30, 20]',
  'line [25, 35]',
].join('\n');

const WORK_ITEMS = [
  'work-item-movement',
  'title "Sprint 4"',
  'columns [Todo, Doing, Done]',
  'AB-1 Todo: 3 -> Done: 5',
  'AB-2 Doing: 2 -> Doing: 2',
].join('\n');

describe('renderChart', () => {
  describe('Feature: Pie chart', () => {
    it('should produce an SVG sized to the layout', () => {
      const rendered = renderChart(parseChart(UNTITLED_PIE));

      expect(rendered.width).toBe(800);
      expect(rendered.height).toBe(582);
      expect(rendered.svg.startsWith('<svg')).toBe(true);
      expect(rendered.svg).toContain('viewBox="0 0 800 582"');
      expect(rendered.svg).toContain('style="max-width: 800px; background-color: white;"');
      expect(rendered.svg).toContain('</svg>');
    });

    it('should serialize the namespaced root of a single-slice pie', () => {
      const rendered = renderChart(parseChart('pie showData\n  "Only": 100\n'));

      expect(rendered.svg.startsWith('<svg')).toBe(true);
      expect(rendered.svg).toContain('xmlns="http://www.w3.org/2000/svg"');
      expect(rendered.svg).toContain('xmlns:xlink="http://www.w3.org/1999/xlink"');
      expect(rendered.svg).toContain('>100%</text>');
    });

    it('should draw slices, legend entries, percentages and the title', () => {
      const { svg, height } = renderChart(parseChart(PIE));

      // the title pushes the optimal height past 600, so the radius shrinks instead
      expect(height).toBe(600);
      expect(svg.match(/class="pieCircle"/g)).toHaveLength(2);
      expect(svg).toContain('class="pieOuterCircle"');
      expect(svg).toContain('Dogs [386]');
      expect(svg).toContain('Cats [85]');
      expect(svg).toContain('>82%<');
      expect(svg).toContain('>18%<');
      expect(svg).toContain('>Pets<');
    });

    it('should write the theme CSS', () => {
      const { svg } = renderChart(parseChart(PIE));

      expect(svg).toContain('.pieCircle { stroke: black; stroke-width: 2px; fill-opacity: 0.7; }');
    });

    it('should apply the config header width and slice colors', () => {
      const source = "%%{init: {'width': 1000, 'themeVariables': {'pie1': '#00ff00'}}}%%\npie\n\"A\": 1\n";
      const rendered = renderChart(parseChart(source));

      expect(rendered.width).toBe(1000);
      expect(rendered.svg).toContain('max-width: 1000px');
      expect(rendered.svg).toContain('fill="#00ff00"');
    });

    it('should let the config width win over the requested width', () => {
      const source = "%%{init: {'width': 640}}%%\npie\n\"A\": 1\n";

      expect(renderChart(parseChart(source), { width: 900 }).width).toBe(640);
    });
  });

  describe('Feature: XY chart', () => {
    it('should draw bars, lines, axes and the legend', () => {
      const { svg, width, height } = renderChart(parseChart(XY));

      expect(width).toBe(800);
      expect(height).toBe(600);
      expect(svg.match(/class="bar-plot-0"/g)).toHaveLength(2);
      expect(svg).toContain('class="line-plot-1"');
      expect(svg).toContain('class="bottom-axis"');
      expect(svg).toContain('class="left-axis"');
      expect(svg).toContain('>Velocity<');
      expect(svg).toContain('>Points<');
      expect(svg).toContain('>Planned<');
      expect(svg).toContain('>S2<');
    });

    it('should honour a requested height', () => {
      const rendered = renderChart(parseChart(XY), { height: 400 });

      expect(rendered.svg).toContain('viewBox="0 0 800 400"');
    });
  });

  describe('Feature: Work item movement chart', () => {
    it('should draw columns, circles, arrows and labels', () => {
      const { svg } = renderChart(parseChart(WORK_ITEMS));

      expect(svg.match(/class="column-line"/g)).toHaveLength(3);
      expect(svg.match(/class="item-circle"/g)).toHaveLength(4);
      expect(svg.match(/class="arrow-head"/g)).toHaveLength(2);
      expect(svg).toContain('>AB-1: +2<');
      expect(svg).toContain('>AB-2<');
      expect(svg).toContain('>Sprint 4<');
    });
  });

  describe('Feature: Logging', () => {
    it('should log each rendered chart', () => {
      const { logger, logs } = createTestLogger();
      renderChart(parseChart(UNTITLED_PIE), { logger });

      const rendered = logs.find((entry) => getMsg(entry) === 'Chart rendered');
      expect(rendered?.['1']).toEqual({ phase: 'serialize', chartType: 'pie', width: 800, height: 582 });
    });
  });
});
