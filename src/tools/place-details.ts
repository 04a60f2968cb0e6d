import { shapePlaceDetails } from '../shapers.js';
import {
  type PlaceDetail,
  type PlaceDetailsInput,
  PlaceDetailsInputSchema,
  type ToolContext,
  type ToolDefinition,
  type ToolResult,
} from '../types.js';
import { fromShaped, providerFailure } from './result.js';

/**
 * Details of a single place, keyed by place_id
 */
async function placeDetails(
  input: PlaceDetailsInput,
  context: ToolContext
): Promise<ToolResult<PlaceDetail>> {
  try {
    const response = await context.provider.place(input.place_id, input.fields);
    return fromShaped(shapePlaceDetails(response));
  } catch (error) {
    return providerFailure('place_details', error);
  }
}

export const placeDetailsTool: ToolDefinition = {
  name: 'place_details',
  description:
    'Details of a place identified by place_id (from find_place or place_nearby): name, address, phone number, website, types, rating and total rating count.',
  inputSchema: PlaceDetailsInputSchema,
  handler: async (input: unknown, context: ToolContext): Promise<ToolResult<unknown>> => {
    const parsed = PlaceDetailsInputSchema.parse(input);
    return placeDetails(parsed, context);
  },
};

export { placeDetails };
