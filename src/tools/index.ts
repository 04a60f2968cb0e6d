import type { ToolDefinition } from '../types.js';
import { directionsTool, getDirections } from './directions.js';
import { distanceTool, getDistance } from './distance.js';
import { geocodeTool, getGeocode } from './geocode.js';
import { findPlaceTool, findPlace } from './find-place.js';
import { placeNearbyTool, placeNearby } from './place-nearby.js';
import { placeDetailsTool, placeDetails } from './place-details.js';

/**
 * All available tools
 */
export const tools: ToolDefinition[] = [
  directionsTool,
  distanceTool,
  geocodeTool,
  findPlaceTool,
  placeNearbyTool,
  placeDetailsTool,
];

/**
 * Get a tool by name
 */
export function getTool(name: string): ToolDefinition | undefined {
  return tools.find((tool) => tool.name === name);
}

// Export individual tools and functions
export {
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
};
export { renderToolResult } from './result.js';
