import { shapeFindPlace } from '../shapers.js';
import {
  type FindPlaceInput,
  FindPlaceInputSchema,
  type PlaceSummary,
  type ToolContext,
  type ToolDefinition,
  type ToolResult,
} from '../types.js';
import { validateQueryType } from '../validators.js';
import { fromShaped, invalidInput, providerFailure } from './result.js';

/**
 * Look up the top candidate for a text or phone number query
 */
async function findPlace(
  input: FindPlaceInput,
  context: ToolContext
): Promise<ToolResult<PlaceSummary>> {
  const inputType = validateQueryType(input.input_type);
  if (!inputType.ok) {
    return invalidInput(inputType.error);
  }

  try {
    const response = await context.provider.findPlace(input.input, inputType.value, input.fields);
    return fromShaped(shapeFindPlace(response));
  } catch (error) {
    return providerFailure('find_place', error);
  }
}

export const findPlaceTool: ToolDefinition = {
  name: 'find_place',
  description:
    'Find a place by name, phone number or establishment type. Returns name, place_id, address, location, types and rating of the top result.',
  inputSchema: FindPlaceInputSchema,
  handler: async (input: unknown, context: ToolContext): Promise<ToolResult<unknown>> => {
    const parsed = FindPlaceInputSchema.parse(input);
    return findPlace(parsed, context);
  },
};

export { findPlace };
