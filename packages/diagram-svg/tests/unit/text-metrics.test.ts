import { describe, expect, it } from 'vitest';
import { TextMeasurer } from '../../src/text-metrics';
import { fixedMetrics } from '../helpers';

describe('TextMeasurer', () => {
  describe('Feature: Character estimate', () => {
    it('should estimate width from the character count', () => {
      const measurer = new TextMeasurer();

      expect(measurer.width('abcd', 10)).toBeCloseTo(21.2);
    });

    it('should count code points rather than UTF-16 units', () => {
      const measurer = new TextMeasurer();

      expect(measurer.width('😀', 100)).toBeCloseTo(53);
    });

    it('should use the pixel size as line height', () => {
      expect(new TextMeasurer().height(17)).toBe(17);
    });

    it('should estimate when metrics are given without font bytes', () => {
      const measurer = new TextMeasurer(fixedMetrics);

      expect(measurer.width('ab', 100)).toBeCloseTo(106);
    });
  });

  describe('Feature: Glyph metrics', () => {
    it('should ask the metrics provider when a font is loaded', () => {
      const measurer = new TextMeasurer(fixedMetrics, new Uint8Array(1));

      expect(measurer.width('abc', 16)).toBe(30);
      expect(measurer.height(16)).toBe(16);
    });
  });

  describe('Feature: Widest text', () => {
    it('should return the widest entry', () => {
      const measurer = new TextMeasurer(fixedMetrics, new Uint8Array(1));

      expect(measurer.maxWidth(['a', 'abcd', 'ab'], 12)).toBe(40);
    });

    it('should return 0 for no texts', () => {
      expect(new TextMeasurer().maxWidth([], 12)).toBe(0);
    });
  });
});
