import { z } from 'zod';
import type { MapsProvider } from './provider/types.js';

// =============================================================================
// Tool Result
// =============================================================================

export interface SuccessResult<T> {
  status: 'ok';
  data: T;
}

export interface NotFoundResult {
  status: 'not_found';
  message: string;
}

export interface ErrorResult {
  status: 'error';
  error: {
    code: string;
    message: string;
  };
}

export type ToolResult<T> = SuccessResult<T> | NotFoundResult | ErrorResult;

// =============================================================================
// Shared
// =============================================================================

export interface LatLng {
  lat: number;
  lng: number;
}

export const LatLngSchema = z.object({
  lat: z.number().min(-90).max(90).describe('Latitude'),
  lng: z.number().min(-180).max(180).describe('Longitude'),
});

// =============================================================================
// Directions Types
// =============================================================================

export const DirectionsInputSchema = z.object({
  origin: z.string().min(1).describe('Originating address or place name'),
  destination: z.string().min(1).describe('Destination address or place name'),
  mode: z
    .string()
    .optional()
    .default('driving')
    .describe('Mode of transportation: driving (default), walking, bicycling or transit'),
});

export type DirectionsInput = z.infer<typeof DirectionsInputSchema>;

export interface DirectionsStep {
  instruction: string;
  distance: string;
  duration: string;
}

export interface DirectionsResult {
  summary?: string;
  total_distance: string;
  total_duration: string;
  steps: DirectionsStep[];
}

// =============================================================================
// Distance Types
// =============================================================================

export const DistanceInputSchema = DirectionsInputSchema;

export type DistanceInput = z.infer<typeof DistanceInputSchema>;

export interface DistanceResult {
  total_distance: string;
  total_duration: string;
}

// =============================================================================
// Geocode Types
// =============================================================================

export const GeocodeInputSchema = z.object({
  address: z.string().min(1).describe('Address or place name to geocode'),
});

export type GeocodeInput = z.infer<typeof GeocodeInputSchema>;

export type GeocodeResult = LatLng;

// =============================================================================
// Find Place Types
// =============================================================================

export const DEFAULT_FIND_PLACE_FIELDS = [
  'place_id',
  'formatted_address',
  'name',
  'geometry',
  'types',
  'rating',
];

export const FindPlaceInputSchema = z.object({
  input: z
    .string()
    .min(1)
    .describe(
      'Name of the place, a phone number, or an establishment type (e.g. bakery). Add city or country for better accuracy.'
    ),
  input_type: z
    .string()
    .optional()
    .default('textquery')
    .describe('Query type: textquery (default) or phonenumber'),
  fields: z
    .array(z.string())
    .optional()
    .default(DEFAULT_FIND_PLACE_FIELDS)
    .describe('Place fields to request from the provider'),
});

export type FindPlaceInput = z.infer<typeof FindPlaceInputSchema>;

export interface PlaceSummary {
  name: string;
  place_id: string;
  formatted_address: string;
  location: LatLng | null;
  types: string[];
  rating: number | null;
}

// =============================================================================
// Place Nearby Types
// =============================================================================

export const PlaceNearbyInputSchema = z.object({
  location: LatLngSchema.describe('Center of the search area'),
  radius: z.number().positive().describe('Search radius in meters (e.g. 2500 = 2.5km)'),
  place_type: z
    .string()
    .min(1)
    .describe('Kind of place to look for, e.g. "italian restaurant" or "hotel"'),
});

export type PlaceNearbyInput = z.infer<typeof PlaceNearbyInputSchema>;

// Place name to place_id, in the order the provider ranked them.
export type PlaceNearbyResult = Map<string, string>;

// =============================================================================
// Place Details Types
// =============================================================================

export const DEFAULT_PLACE_DETAILS_FIELDS = [
  'name',
  'formatted_address',
  'formatted_phone_number',
  'website',
  'types',
  'rating',
  'user_ratings_total',
];

export const PlaceDetailsInputSchema = z.object({
  place_id: z
    .string()
    .min(1)
    .describe('Place identifier, as returned by find_place or place_nearby'),
  fields: z
    .array(z.string())
    .optional()
    .default(DEFAULT_PLACE_DETAILS_FIELDS)
    .describe('Place fields to request from the provider'),
});

export type PlaceDetailsInput = z.infer<typeof PlaceDetailsInputSchema>;

export interface PlaceDetail {
  name: string;
  formatted_address?: string;
  formatted_phone_number?: string;
  website?: string;
  types?: string[];
  rating?: number;
  user_ratings_total: number;
}

// =============================================================================
// Tool Definition Types
// =============================================================================

export interface ToolContext {
  provider: MapsProvider;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodType;
  handler: (input: unknown, context: ToolContext) => Promise<ToolResult<unknown>>;
}
