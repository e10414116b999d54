import { describe, it, expect } from 'vitest';
import {
  applyPercentDiscount,
  divideCents,
  formatCents,
  roundHalfUp,
  toCents,
} from '../../../src/utils/money.js';

describe('money', () => {
  describe('toCents', () => {
    it('should round half up despite float noise', () => {
      expect(toCents(12.345)).toBe(1235);
      expect(toCents(2.675)).toBe(268);
      expect(toCents(59.9)).toBe(5990);
    });

    it('should map non-finite amounts to zero', () => {
      expect(toCents(Number.NaN)).toBe(0);
      expect(toCents(Number.POSITIVE_INFINITY)).toBe(0);
    });
  });

  describe('roundHalfUp', () => {
    it('should round halves away from zero', () => {
      expect(roundHalfUp(0.5)).toBe(1);
      expect(roundHalfUp(-0.5)).toBe(-1);
      expect(roundHalfUp(3333.33)).toBe(3333);
    });
  });

  describe('divideCents', () => {
    it('should divide to the nearest cent', () => {
      expect(divideCents(48000, 6)).toBe(8000);
      expect(divideCents(100, 3)).toBe(33);
      expect(divideCents(200, 3)).toBe(67);
    });

    it('should leave the amount as is for a non-positive divisor', () => {
      expect(divideCents(500, 0)).toBe(500);
    });
  });

  describe('applyPercentDiscount', () => {
    it('should apply the percentage', () => {
      expect(applyPercentDiscount(48000, 10)).toBe(43200);
    });

    it('should cap the discount at 100%', () => {
      expect(applyPercentDiscount(48000, 150)).toBe(0);
    });

    it('should ignore non-positive percentages', () => {
      expect(applyPercentDiscount(48000, 0)).toBe(48000);
      expect(applyPercentDiscount(48000, -5)).toBe(48000);
    });
  });

  describe('formatCents', () => {
    it('should use a decimal comma with two places', () => {
      expect(formatCents(1234)).toBe('12,34');
      expect(formatCents(5)).toBe('0,05');
      expect(formatCents(0)).toBe('0,00');
      expect(formatCents(-101)).toBe('-1,01');
      expect(formatCents(192000)).toBe('1920,00');
    });
  });
});
