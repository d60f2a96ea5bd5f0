import { describe, it, expect } from '@jest/globals';
import {
  ValidationError,
  validateFilterSpec,
  validateRfmFilter,
  validateThresholds,
  validateTopSkuCount,
} from '@/lib/validation';
import { FilterSpec } from '@/types/dashboard';

const spec: FilterSpec = {
  yearMonth: { from: '2024-01', to: '2024-06' },
  company: [],
  brands: ['Alpha'],
  shop: [],
  shippingCountry: [],
  campaignType: [],
  hasCoupon: true,
};

describe('Validation', () => {
  describe('validateFilterSpec', () => {
    it('accepts a well-formed spec', () => {
      expect(validateFilterSpec(spec)).toBe(spec);
    });

    it('accepts a single-month range', () => {
      expect(() => validateFilterSpec({ ...spec, yearMonth: { from: '2024-03', to: '2024-03' } })).not.toThrow();
    });

    it('rejects an empty range end', () => {
      expect(() => validateFilterSpec({ ...spec, yearMonth: { from: '2024-01', to: ' ' } })).toThrow(
        'Range end is required',
      );
    });

    it('rejects a reversed range and names the field', () => {
      try {
        validateFilterSpec({ ...spec, yearMonth: { from: '2024-06', to: '2024-01' } });
        throw new Error('expected a validation error');
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (err instanceof ValidationError) {
          expect(err.field).toBe('yearMonth');
          expect(err.message).toBe('Range start 2024-06 is after range end 2024-01');
        }
      }
    });
  });

  describe('validateThresholds', () => {
    it('accepts boundary values', () => {
      const t = { minSupport: 0, minConfidence: 1, minLift: 0 };
      expect(validateThresholds(t)).toBe(t);
    });

    it('rejects support above one', () => {
      expect(() => validateThresholds({ minSupport: 1.2, minConfidence: 0.2, minLift: 1 })).toThrow(
        'Min support must be between 0 and 1',
      );
    });

    it('rejects negative or non-finite lift', () => {
      expect(() => validateThresholds({ minSupport: 0, minConfidence: 0, minLift: -1 })).toThrow(ValidationError);
      expect(() => validateThresholds({ minSupport: 0, minConfidence: 0, minLift: NaN })).toThrow(ValidationError);
    });
  });

  describe('validateTopSkuCount', () => {
    it('accepts slider positions', () => {
      expect(validateTopSkuCount(10)).toBe(10);
      expect(validateTopSkuCount(35)).toBe(35);
      expect(validateTopSkuCount(50)).toBe(50);
    });

    it('rejects values off the step grid', () => {
      expect(() => validateTopSkuCount(12)).toThrow('Top N must move in steps of 5');
    });

    it('rejects values outside the slider', () => {
      expect(() => validateTopSkuCount(5)).toThrow('Top N must be between 10 and 50');
      expect(() => validateTopSkuCount(55)).toThrow('Top N must be between 10 and 50');
    });

    it('rejects non-integers', () => {
      expect(() => validateTopSkuCount(12.5)).toThrow('Top N must be an integer');
      expect(() => validateTopSkuCount('20')).toThrow('Top N must be an integer');
    });
  });

  describe('validateRfmFilter', () => {
    it('accepts a filter without recency', () => {
      expect(() => validateRfmFilter({ segments: ['Loyal'], clusters: [] })).not.toThrow();
    });

    it('rejects an inverted recency range', () => {
      expect(() => validateRfmFilter({ segments: [], clusters: [], recency: { min: 90, max: 30 } })).toThrow(
        'Recency minimum 90 is above maximum 30',
      );
    });
  });
});
