import type { LatLng } from '../types.js';
import type { PlaceQueryType, TravelModeName } from '../validators.js';

// =============================================================================
// Raw Provider Payloads
//
// Everything here is provider JSON and is read defensively: any field may be
// missing, so all of them are optional.
// =============================================================================

export interface TextValue {
  text?: string;
  value?: number;
}

export interface RawDirectionsStep {
  html_instructions?: string;
  distance?: TextValue;
  duration?: TextValue;
}

export interface RawDirectionsLeg {
  distance?: TextValue;
  duration?: TextValue;
  steps?: RawDirectionsStep[];
}

export interface RawDirectionsRoute {
  summary?: string;
  legs?: RawDirectionsLeg[];
}

export interface RawDistanceMatrixElement {
  status?: string;
  distance?: TextValue;
  duration?: TextValue;
}

export interface RawDistanceMatrix {
  rows?: { elements?: RawDistanceMatrixElement[] }[];
}

export interface RawGeometry {
  location?: Partial<LatLng>;
}

export interface RawGeocodeResult {
  geometry?: RawGeometry;
  formatted_address?: string;
}

export interface RawPlace {
  name?: string;
  place_id?: string;
  formatted_address?: string;
  formatted_phone_number?: string;
  website?: string;
  geometry?: RawGeometry;
  types?: string[];
  rating?: number | null;
  user_ratings_total?: number | null;
}

export interface RawFindPlaceResponse {
  candidates?: RawPlace[];
}

export interface RawPlacesNearbyResponse {
  results?: RawPlace[];
}

export interface RawPlaceDetailsResponse {
  result?: RawPlace;
}

// =============================================================================
// Provider Boundary
// =============================================================================

/**
 * The mapping provider as the tools see it. Implementations perform exactly one
 * logical lookup per call and return the provider's payload untouched, or null
 * when there is nothing to return.
 */
export interface MapsProvider {
  directions(
    origin: string,
    destination: string,
    mode: TravelModeName
  ): Promise<RawDirectionsRoute[] | null>;

  distanceMatrix(
    origin: string,
    destination: string,
    mode: TravelModeName
  ): Promise<RawDistanceMatrix | null>;

  geocode(address: string): Promise<RawGeocodeResult[] | null>;

  findPlace(
    input: string,
    inputType: PlaceQueryType,
    fields: string[]
  ): Promise<RawFindPlaceResponse | null>;

  placesNearby(
    location: LatLng,
    radius: number,
    keyword: string
  ): Promise<RawPlacesNearbyResponse | null>;

  place(placeId: string, fields: string[]): Promise<RawPlaceDetailsResponse | null>;
}
