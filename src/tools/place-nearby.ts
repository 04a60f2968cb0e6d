import { shapePlaceNearby } from '../shapers.js';
import {
  type PlaceNearbyInput,
  PlaceNearbyInputSchema,
  type PlaceNearbyResult,
  type ToolContext,
  type ToolDefinition,
  type ToolResult,
} from '../types.js';
import { fromShaped, providerFailure } from './result.js';

async function placeNearby(
  input: PlaceNearbyInput,
  context: ToolContext
): Promise<ToolResult<PlaceNearbyResult>> {
  try {
    const response = await context.provider.placesNearby(
      input.location,
      input.radius,
      input.place_type
    );
    return fromShaped(shapePlaceNearby(response));
  } catch (error) {
    return providerFailure('place_nearby', error);
  }
}

export const placeNearbyTool: ToolDefinition = {
  name: 'place_nearby',
  description:
    'Find places of a given kind (e.g. "italian restaurant", "hotel") within a radius in meters of a latitude/longitude. Returns a mapping of place name to place_id.',
  inputSchema: PlaceNearbyInputSchema,
  handler: async (input: unknown, context: ToolContext): Promise<ToolResult<unknown>> => {
    const parsed = PlaceNearbyInputSchema.parse(input);
    return placeNearby(parsed, context);
  },
};

export { placeNearby };
