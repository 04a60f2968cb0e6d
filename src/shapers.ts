import { stripMarkup } from './text.js';
import type {
  RawDirectionsRoute,
  RawDistanceMatrix,
  RawFindPlaceResponse,
  RawGeocodeResult,
  RawGeometry,
  RawPlaceDetailsResponse,
  RawPlacesNearbyResponse,
} from './provider/types.js';
import type {
  DirectionsResult,
  DirectionsStep,
  DistanceResult,
  GeocodeResult,
  LatLng,
  PlaceDetail,
  PlaceNearbyResult,
  PlaceSummary,
} from './types.js';

export const NOT_FOUND = {
  directions: 'No directions found for the specified locations.',
  distance: 'No distance information found for the specified locations.',
  geocode: 'Address not found',
  findPlace: 'No such place found',
  placeNearby: 'Nothing nearby that matches the search criteria was found.',
  placeDetails: 'No such place found.',
  placeDetailsEmpty: 'No details found for the specified place.',
  placeDetailsMissingName: 'Essential place details (e.g. name) are missing.',
} as const;

export type Shaped<T> = { found: true; data: T } | { found: false; message: string };

function found<T>(data: T): { found: true; data: T } {
  return { found: true, data };
}

function notFound(message: string): { found: false; message: string } {
  return { found: false, message };
}

function extractLocation(geometry: RawGeometry | undefined): LatLng | null {
  const lat = geometry?.location?.lat;
  const lng = geometry?.location?.lng;
  if (typeof lat !== 'number' || typeof lng !== 'number') {
    return null;
  }
  return { lat, lng };
}

/**
 * Totals are taken from the first leg only. Multi-waypoint routes therefore
 * report the first segment's distance and duration while still listing the
 * steps of every leg.
 */
export function shapeDirections(
  routes: RawDirectionsRoute[] | null | undefined
): Shaped<DirectionsResult> {
  const route = routes?.[0];
  const firstLeg = route?.legs?.[0];
  const totalDistance = firstLeg?.distance?.text;
  const totalDuration = firstLeg?.duration?.text;

  if (!route || totalDistance === undefined || totalDuration === undefined) {
    return notFound(NOT_FOUND.directions);
  }

  const steps: DirectionsStep[] = [];
  for (const leg of route.legs ?? []) {
    for (const step of leg.steps ?? []) {
      steps.push({
        instruction: stripMarkup(step.html_instructions ?? ''),
        distance: step.distance?.text ?? '',
        duration: step.duration?.text ?? '',
      });
    }
  }

  const result: DirectionsResult = {
    total_distance: totalDistance,
    total_duration: totalDuration,
    steps,
  };

  if (typeof route.summary === 'string' && route.summary.length > 0) {
    return found({ summary: route.summary, ...result });
  }
  return found(result);
}

const EMPTY_ELEMENT_STATUSES = new Set(['ZERO_RESULTS', 'NOT_FOUND']);

export function shapeDistance(
  matrix: RawDistanceMatrix | null | undefined
): Shaped<DistanceResult> {
  const element = matrix?.rows?.[0]?.elements?.[0];
  if (!element || (element.status !== undefined && EMPTY_ELEMENT_STATUSES.has(element.status))) {
    return notFound(NOT_FOUND.distance);
  }

  const distance = element.distance?.text;
  const duration = element.duration?.text;
  if (distance === undefined || duration === undefined) {
    return notFound(NOT_FOUND.distance);
  }

  return found({ total_distance: distance, total_duration: duration });
}

export function shapeGeocode(
  results: RawGeocodeResult[] | null | undefined
): Shaped<GeocodeResult> {
  const location = extractLocation(results?.[0]?.geometry);
  if (!location) {
    return notFound(NOT_FOUND.geocode);
  }
  return found(location);
}

export function shapeFindPlace(
  response: RawFindPlaceResponse | null | undefined
): Shaped<PlaceSummary> {
  const place = response?.candidates?.[0];
  if (!place?.name || !place.place_id) {
    return notFound(NOT_FOUND.findPlace);
  }

  return found({
    name: place.name,
    place_id: place.place_id,
    formatted_address: place.formatted_address ?? '',
    location: extractLocation(place.geometry),
    types: place.types ?? [],
    rating: typeof place.rating === 'number' ? place.rating : null,
  });
}

/**
 * A response with an empty results list is a valid, empty mapping. Only a
 * missing response counts as "nothing nearby".
 */
export function shapePlaceNearby(
  response: RawPlacesNearbyResponse | null | undefined
): Shaped<PlaceNearbyResult> {
  if (!response) {
    return notFound(NOT_FOUND.placeNearby);
  }

  const places = new Map<string, string>();
  for (const place of response.results ?? []) {
    if (place.name && place.place_id) {
      places.set(place.name, place.place_id);
    }
  }
  return found(places);
}

export function shapePlaceDetails(
  response: RawPlaceDetailsResponse | null | undefined
): Shaped<PlaceDetail> {
  if (!response) {
    return notFound(NOT_FOUND.placeDetails);
  }

  const details = response.result;
  if (!details || Object.keys(details).length === 0) {
    return notFound(NOT_FOUND.placeDetailsEmpty);
  }
  if (!details.name) {
    return notFound(NOT_FOUND.placeDetailsMissingName);
  }

  const { formatted_address, formatted_phone_number, website, types, rating } = details;
  return found({
    name: details.name,
    ...(formatted_address != null ? { formatted_address } : {}),
    ...(formatted_phone_number != null ? { formatted_phone_number } : {}),
    ...(website != null ? { website } : {}),
    ...(types != null ? { types } : {}),
    ...(rating != null ? { rating } : {}),
    user_ratings_total: details.user_ratings_total ?? 0,
  });
}
