import { describe, it, expect } from 'vitest';
import {
  validateTravelMode,
  validateQueryType,
  TRAVEL_MODES,
  PLACE_QUERY_TYPES,
} from '../../src/validators.js';

describe('validateTravelMode', () => {
  it('should accept every allowed mode', () => {
    for (const mode of TRAVEL_MODES) {
      expect(validateTravelMode(mode)).toEqual({ ok: true, value: mode });
    }
  });

  it('should reject an unknown mode and name the allowed set', () => {
    expect(validateTravelMode('flying')).toEqual({
      ok: false,
      error: {
        code: 'INVALID_ENUM',
        message:
          "'flying' is not one of the allowed travel modes: driving, walking, bicycling, transit",
      },
    });
  });

  it('should be case sensitive', () => {
    expect(validateTravelMode('Driving').ok).toBe(false);
    expect(validateTravelMode(' driving').ok).toBe(false);
  });

  it('should reject an empty string', () => {
    expect(validateTravelMode('').ok).toBe(false);
  });
});

describe('validateQueryType', () => {
  it('should accept every allowed query type', () => {
    for (const inputType of PLACE_QUERY_TYPES) {
      expect(validateQueryType(inputType)).toEqual({ ok: true, value: inputType });
    }
  });

  it('should reject an unknown query type and name the allowed set', () => {
    expect(validateQueryType('email')).toEqual({
      ok: false,
      error: {
        code: 'INVALID_ENUM',
        message: "'email' is not one of the allowed input types: textquery, phonenumber",
      },
    });
  });
});
