import { describe, it, expect } from 'vitest';
import { isValidCoordinate, isValidDateISO, isValidUrl, ValidationError } from '../../src/util/validation.js';

describe('validation', () => {
  describe('isValidDateISO', () => {
    it('should validate correct ISO date format', () => {
      expect(isValidDateISO('2025-01-13')).toBe(true);
      expect(isValidDateISO('2024-12-31')).toBe(true);
    });

    it('should reject invalid formats', () => {
      expect(isValidDateISO('2025/01/13')).toBe(false);
      expect(isValidDateISO('01-13-2025')).toBe(false);
      expect(isValidDateISO('2025-1-13')).toBe(false);
      expect(isValidDateISO('invalid')).toBe(false);
    });

    it('should reject invalid dates', () => {
      // JavaScript Date constructor is lenient, so we need to check if the parsed date matches the input
      const testDate1 = new Date('2025-13-01');
      const testDate2 = new Date('2025-02-30');
      
      // These dates get adjusted by JavaScript, so we check if they're different from what we expect
      // '2025-13-01' becomes '2026-01-01', '2025-02-30' becomes '2025-03-02'
      expect(testDate1.getMonth() + 1).not.toBe(13); // Month is 0-indexed, so +1
      expect(testDate2.getDate()).not.toBe(30);
      
      // Our validation should catch these by checking if the date string matches the parsed date
      // Since JavaScript adjusts them, isValidDateISO should return false for these
      // But actually, JavaScript's Date constructor will parse these and adjust them
      // So we need to validate by checking if the date components match
      expect(isValidDateISO('2025-13-01')).toBe(false); // Invalid month
      expect(isValidDateISO('2025-02-30')).toBe(false); // Invalid day
    });
  });

  describe('isValidCoordinate', () => {
    it('should accept latitude/longitude pairs within range', () => {
      expect(isValidCoordinate(40.7506, -73.9935)).toBe(true);
      expect(isValidCoordinate(-90, 180)).toBe(true);
    });

    it('should reject out-of-range or non-finite values', () => {
      expect(isValidCoordinate(90.1, 0)).toBe(false);
      expect(isValidCoordinate(0, -180.5)).toBe(false);
      expect(isValidCoordinate(Number.NaN, 10)).toBe(false);
    });
  });

  describe('isValidUrl', () => {
    it('should validate correct URLs', () => {
      expect(isValidUrl('http://localhost:8000')).toBe(true);
      expect(isValidUrl('https://api.example.com')).toBe(true);
    });

    it('should reject invalid URLs', () => {
      expect(isValidUrl('not-a-url')).toBe(false);
      expect(isValidUrl('')).toBe(false);
    });
  });

  describe('ValidationError', () => {
    it('should create error with message and field', () => {
      const error = new ValidationError('Invalid input', 'fieldName');
      expect(error.message).toBe('Invalid input');
      expect(error.field).toBe('fieldName');
      expect(error.name).toBe('ValidationError');
    });
  });
});

