import { shapeDistance } from '../shapers.js';
import {
  type DistanceInput,
  DistanceInputSchema,
  type DistanceResult,
  type ToolContext,
  type ToolDefinition,
  type ToolResult,
} from '../types.js';
import { validateTravelMode } from '../validators.js';
import { fromShaped, invalidInput, providerFailure } from './result.js';

async function getDistance(
  input: DistanceInput,
  context: ToolContext
): Promise<ToolResult<DistanceResult>> {
  const mode = validateTravelMode(input.mode);
  if (!mode.ok) {
    return invalidInput(mode.error);
  }

  try {
    const matrix = await context.provider.distanceMatrix(
      input.origin,
      input.destination,
      mode.value
    );
    return fromShaped(shapeDistance(matrix));
  } catch (error) {
    return providerFailure('get_distance', error);
  }
}

export const distanceTool: ToolDefinition = {
  name: 'get_distance',
  description:
    'Total travel distance and duration between origin and destination for a mode of transport (driving, walking, bicycling or transit).',
  inputSchema: DistanceInputSchema,
  handler: async (input: unknown, context: ToolContext): Promise<ToolResult<unknown>> => {
    const parsed = DistanceInputSchema.parse(input);
    return getDistance(parsed, context);
  },
};

export { getDistance };
