import { shapeDirections } from '../shapers.js';
import {
  type DirectionsInput,
  DirectionsInputSchema,
  type DirectionsResult,
  type ToolContext,
  type ToolDefinition,
  type ToolResult,
} from '../types.js';
import { validateTravelMode } from '../validators.js';
import { fromShaped, invalidInput, providerFailure } from './result.js';

/**
 * Step-by-step directions between two free-text locations
 */
async function getDirections(
  input: DirectionsInput,
  context: ToolContext
): Promise<ToolResult<DirectionsResult>> {
  const mode = validateTravelMode(input.mode);
  if (!mode.ok) {
    return invalidInput(mode.error);
  }

  try {
    const routes = await context.provider.directions(input.origin, input.destination, mode.value);
    return fromShaped(shapeDirections(routes));
  } catch (error) {
    return providerFailure('get_directions', error);
  }
}

export const directionsTool: ToolDefinition = {
  name: 'get_directions',
  description:
    'Step-by-step instructions to get from origin to destination using a mode of transport (driving, walking, bicycling or transit). Returns total distance, total duration and the list of steps. Totals cover the first leg of the route.',
  inputSchema: DirectionsInputSchema,
  handler: async (input: unknown, context: ToolContext): Promise<ToolResult<unknown>> => {
    const parsed = DirectionsInputSchema.parse(input);
    return getDirections(parsed, context);
  },
};

export { getDirections };
