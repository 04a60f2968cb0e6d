export const TRAVEL_MODES = ['driving', 'walking', 'bicycling', 'transit'] as const;
export const PLACE_QUERY_TYPES = ['textquery', 'phonenumber'] as const;

export type TravelModeName = (typeof TRAVEL_MODES)[number];
export type PlaceQueryType = (typeof PLACE_QUERY_TYPES)[number];

export interface ValidationError {
  code: 'INVALID_ENUM';
  message: string;
}

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

function validateEnum<T extends string>(
  value: string,
  allowed: readonly T[],
  label: string
): ValidationResult<T> {
  const match = allowed.find((candidate) => candidate === value);
  if (match !== undefined) {
    return { ok: true, value: match };
  }
  return {
    ok: false,
    error: {
      code: 'INVALID_ENUM',
      message: `'${value}' is not one of the allowed ${label}: ${allowed.join(', ')}`,
    },
  };
}

export function validateTravelMode(mode: string): ValidationResult<TravelModeName> {
  return validateEnum(mode, TRAVEL_MODES, 'travel modes');
}

export function validateQueryType(inputType: string): ValidationResult<PlaceQueryType> {
  return validateEnum(inputType, PLACE_QUERY_TYPES, 'input types');
}
