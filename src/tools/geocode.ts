import { shapeGeocode } from '../shapers.js';
import {
  type GeocodeInput,
  GeocodeInputSchema,
  type GeocodeResult,
  type ToolContext,
  type ToolDefinition,
  type ToolResult,
} from '../types.js';
import { fromShaped, providerFailure } from './result.js';

/**
 * Forward geocoding: address or place name to coordinates
 */
async function getGeocode(
  input: GeocodeInput,
  context: ToolContext
): Promise<ToolResult<GeocodeResult>> {
  try {
    const results = await context.provider.geocode(input.address);
    return fromShaped(shapeGeocode(results));
  } catch (error) {
    return providerFailure('get_geocode', error);
  }
}

export const geocodeTool: ToolDefinition = {
  name: 'get_geocode',
  description:
    'Forward geocoding: convert an address or place name into latitude/longitude coordinates of the best match.',
  inputSchema: GeocodeInputSchema,
  handler: async (input: unknown, context: ToolContext): Promise<ToolResult<unknown>> => {
    const parsed = GeocodeInputSchema.parse(input);
    return getGeocode(parsed, context);
  },
};

export { getGeocode };
