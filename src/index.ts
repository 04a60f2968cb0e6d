/**
 * Google Maps Tools MCP Server
 *
 * Directions, distance, geocoding and place lookups backed by the Google Maps
 * Platform web services.
 */

// Export server creation
export { createServer, dispatchTool, SERVER_NAME, SERVER_VERSION } from './server.js';

// Export configuration
export { getConfig, setConfig, loadConfig, type Config, type TransportMode } from './config.js';

// Export transport utilities
export {
  closeServer,
  createMcpHttpServer,
  createSseHttpServer,
  startHttpTransport,
  startSseTransport,
  startStdioTransport,
} from './transport/index.js';

// Export provider
export { GoogleMapsProvider, type GoogleMapsProviderOptions } from './provider/google.js';
export { ProviderError, type ProviderErrorKind } from './provider/errors.js';
export { withRetry, type RetryOptions } from './provider/retry.js';
export type { MapsProvider } from './provider/types.js';

// Export validation, normalization and shaping
export {
  validateTravelMode,
  validateQueryType,
  TRAVEL_MODES,
  PLACE_QUERY_TYPES,
  type TravelModeName,
  type PlaceQueryType,
  type ValidationResult,
} from './validators.js';
export { stripMarkup } from './text.js';
export {
  shapeDirections,
  shapeDistance,
  shapeGeocode,
  shapeFindPlace,
  shapePlaceNearby,
  shapePlaceDetails,
  NOT_FOUND,
} from './shapers.js';

// Export tools
export {
  tools,
  getTool,
  renderToolResult,
  directionsTool,
  getDirections,
  distanceTool,
  getDistance,
  geocodeTool,
  getGeocode,
  findPlaceTool,
  findPlace,
  placeNearbyTool,
  placeNearby,
  placeDetailsTool,
  placeDetails,
} from './tools/index.js';

// Export types
export type {
  // Tool results
  ToolResult,
  SuccessResult,
  NotFoundResult,
  ErrorResult,
  // Tool definitions
  ToolDefinition,
  ToolContext,
  LatLng,
  // Directions
  DirectionsInput,
  DirectionsResult,
  DirectionsStep,
  // Distance
  DistanceInput,
  DistanceResult,
  // Geocode
  GeocodeInput,
  GeocodeResult,
  // Find place
  FindPlaceInput,
  PlaceSummary,
  // Place nearby
  PlaceNearbyInput,
  PlaceNearbyResult,
  // Place details
  PlaceDetailsInput,
  PlaceDetail,
} from './types.js';
