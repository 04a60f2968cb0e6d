import axios, { type AxiosInstance } from 'axios';
import { Client, PlaceInputType, Status, TravelMode } from '@googlemaps/google-maps-services-js';
import { EMPTY_STATUSES, isEmptyStatusError, statusError } from './errors.js';
import { withRetry, type RetryOptions } from './retry.js';
import type {
  MapsProvider,
  RawDirectionsRoute,
  RawDistanceMatrix,
  RawFindPlaceResponse,
  RawGeocodeResult,
  RawPlaceDetailsResponse,
  RawPlacesNearbyResponse,
} from './types.js';
import type { LatLng } from '../types.js';
import type { PlaceQueryType, TravelModeName } from '../validators.js';

export type GoogleMapsClient = Pick<
  Client,
  'directions' | 'distancematrix' | 'geocode' | 'findPlaceFromText' | 'placesNearby' | 'placeDetails'
>;

export interface GoogleMapsProviderOptions {
  apiKey: string;
  timeoutMs: number;
  retry: RetryOptions;
  /** HTTP instance for the default client. */
  axiosInstance?: AxiosInstance;
  client?: GoogleMapsClient;
}

const TRAVEL_MODES: Record<TravelModeName, TravelMode> = {
  driving: TravelMode.driving,
  walking: TravelMode.walking,
  bicycling: TravelMode.bicycling,
  transit: TravelMode.transit,
};

const INPUT_TYPES: Record<PlaceQueryType, PlaceInputType> = {
  textquery: PlaceInputType.textQuery,
  phonenumber: PlaceInputType.phoneNumber,
};

interface StatusBody {
  status: string;
  error_message?: string;
}

/**
 * Returns false when the provider reported an empty result, throws on any
 * other non-OK status.
 */
function checkStatus(body: StatusBody): boolean {
  if (body.status === Status.OK) {
    return true;
  }
  if (EMPTY_STATUSES.has(body.status)) {
    return false;
  }
  throw statusError(body.status, body.error_message);
}

/**
 * The library's default HTTP instance rewrites provider statuses into HTTP
 * errors and retries on its own. A plain instance leaves the status in the
 * body and leaves retrying to withRetry.
 */
function createClient(axiosInstance: AxiosInstance | undefined): GoogleMapsClient {
  return new Client({ axiosInstance: axiosInstance ?? axios.create() });
}

/**
 * MapsProvider backed by the Google Maps Platform web services.
 */
export class GoogleMapsProvider implements MapsProvider {
  private readonly client: GoogleMapsClient;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryOptions;

  constructor(options: GoogleMapsProviderOptions) {
    this.client = options.client ?? createClient(options.axiosInstance);
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry;
  }

  /**
   * Send one request under the retry policy. An empty-result status, in the
   * body or on an HTTP error, yields `empty`.
   */
  private lookup<B extends StatusBody, T>(
    operationName: string,
    send: () => Promise<{ data: B }>,
    pick: (body: B) => T,
    empty: T | null
  ): Promise<T | null> {
    return withRetry(
      async () => {
        let body: B;
        try {
          body = (await send()).data;
        } catch (error) {
          if (isEmptyStatusError(error)) {
            return empty;
          }
          throw error;
        }
        return checkStatus(body) ? pick(body) : empty;
      },
      operationName,
      this.retry
    );
  }

  async directions(
    origin: string,
    destination: string,
    mode: TravelModeName
  ): Promise<RawDirectionsRoute[] | null> {
    return this.lookup(
      'directions',
      () =>
        this.client.directions({
          params: { origin, destination, mode: TRAVEL_MODES[mode], key: this.apiKey },
          timeout: this.timeoutMs,
        }),
      (body) => body.routes,
      []
    );
  }

  async distanceMatrix(
    origin: string,
    destination: string,
    mode: TravelModeName
  ): Promise<RawDistanceMatrix | null> {
    return this.lookup(
      'distance matrix',
      () =>
        this.client.distancematrix({
          params: {
            origins: [origin],
            destinations: [destination],
            mode: TRAVEL_MODES[mode],
            key: this.apiKey,
          },
          timeout: this.timeoutMs,
        }),
      (body) => ({ rows: body.rows }),
      null
    );
  }

  async geocode(address: string): Promise<RawGeocodeResult[] | null> {
    return this.lookup(
      'geocode',
      () =>
        this.client.geocode({
          params: { address, key: this.apiKey },
          timeout: this.timeoutMs,
        }),
      (body) => body.results,
      []
    );
  }

  async findPlace(
    input: string,
    inputType: PlaceQueryType,
    fields: string[]
  ): Promise<RawFindPlaceResponse | null> {
    return this.lookup(
      'find place',
      () =>
        this.client.findPlaceFromText({
          params: { input, inputtype: INPUT_TYPES[inputType], fields, key: this.apiKey },
          timeout: this.timeoutMs,
        }),
      (body) => ({ candidates: body.candidates }),
      { candidates: [] }
    );
  }

  async placesNearby(
    location: LatLng,
    radius: number,
    keyword: string
  ): Promise<RawPlacesNearbyResponse | null> {
    return this.lookup(
      'places nearby',
      () =>
        this.client.placesNearby({
          params: { location, radius, keyword, key: this.apiKey },
          timeout: this.timeoutMs,
        }),
      (body) => ({ results: body.results }),
      { results: [] }
    );
  }

  async place(placeId: string, fields: string[]): Promise<RawPlaceDetailsResponse | null> {
    return this.lookup(
      'place details',
      () =>
        this.client.placeDetails({
          params: { place_id: placeId, fields, key: this.apiKey },
          timeout: this.timeoutMs,
        }),
      (body) => ({ result: body.result }),
      null
    );
  }
}
