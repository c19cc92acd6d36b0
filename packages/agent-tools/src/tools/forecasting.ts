/**
 * Forecasting tools: thin capabilities over the forecasting service.
 *
 * The runtime treats them as opaque tools; responses are passed to the model
 * as JSON text.
 */

import { z } from 'zod';
import type { ToolResult } from '@conclave/agent-contracts';
import type { ToolFactory } from '../types.js';
import { FORECASTING_CONFIG, TOOL_NAMES } from '../config.js';
import { ForecastingApiError, type ForecastingClient } from '../clients/forecasting-client.js';
import { parseToolInput } from '../utils.js';
import { toolError, toolErrorFromException } from './tool-error.js';

const ForecastIdSchema = z.object({ forecast_id: z.number().int().positive() });

const SubmitSchema = z.object({
  forecast_id: z.number().int().positive(),
  point_forecast: z.number(),
  reason: z.string().min(1),
});

function jsonOutput(data: unknown): ToolResult {
  const text = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
  const max = FORECASTING_CONFIG.maxResponseChars;
  return {
    success: true,
    output: text.length > max ? `${text.slice(0, max)}\n... [${text.length - max} more chars]` : text,
  };
}

function apiError(error: unknown): ToolResult {
  if (error instanceof ForecastingApiError) {
    return toolError({
      code: 'FORECASTING_API_ERROR',
      message: error.message,
      retryable: error.status >= 500 || error.status === 429,
      details: { status: error.status },
    });
  }
  return toolErrorFromException('FORECASTING_API_ERROR', error);
}

const forecastIdParameters = {
  type: 'object' as const,
  properties: {
    forecast_id: { type: 'integer' as const, description: 'Forecast id from list_forecasts' },
  },
  required: ['forecast_id'],
};

export function createListForecastsTool(client: ForecastingClient): ToolFactory {
  return () => ({
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.listForecasts,
        description: 'List the forecasts that are open for you: new ones and ones whose last point is stale.',
        parameters: { type: 'object', properties: {} },
      },
    },
    executor: async () => {
      try {
        return jsonOutput(await client.listForecasts());
      } catch (error) {
        return apiError(error);
      }
    },
  });
}

export function createGetForecastTool(client: ForecastingClient): ToolFactory {
  return () => ({
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.getForecast,
        description: 'Get one forecast with its question, background and resolution criteria.',
        parameters: forecastIdParameters,
      },
    },
    executor: async (input) => {
      const parsed = parseToolInput(TOOL_NAMES.getForecast, ForecastIdSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      try {
        return jsonOutput(await client.getForecast(parsed.data.forecast_id));
      } catch (error) {
        return apiError(error);
      }
    },
  });
}

export function createGetForecastPointsTool(client: ForecastingClient): ToolFactory {
  return () => ({
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.getForecastPoints,
        description: 'Get the points you previously submitted for a forecast, with their reasons.',
        parameters: forecastIdParameters,
      },
    },
    executor: async (input) => {
      const parsed = parseToolInput(TOOL_NAMES.getForecastPoints, ForecastIdSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      try {
        return jsonOutput(await client.getForecastPoints(parsed.data.forecast_id));
      } catch (error) {
        return apiError(error);
      }
    },
  });
}

export function createSubmitForecastTool(client: ForecastingClient): ToolFactory {
  return () => ({
    definition: {
      type: 'function',
      function: {
        name: TOOL_NAMES.submitForecast,
        description: 'Submit a new probability for a forecast together with the reasoning behind it.',
        parameters: {
          type: 'object',
          properties: {
            forecast_id: { type: 'integer', description: 'Forecast id' },
            point_forecast: {
              type: 'number',
              minimum: FORECASTING_CONFIG.minPoint,
              maximum: FORECASTING_CONFIG.maxPoint,
              description: 'Probability between 0 and 1',
            },
            reason: { type: 'string', description: 'Reasoning behind the probability' },
          },
          required: ['forecast_id', 'point_forecast', 'reason'],
        },
      },
    },
    executor: async (input) => {
      const parsed = parseToolInput(TOOL_NAMES.submitForecast, SubmitSchema, input);
      if (!parsed.ok) {
        return parsed.result;
      }
      const { forecast_id, point_forecast, reason } = parsed.data;
      if (point_forecast < FORECASTING_CONFIG.minPoint || point_forecast > FORECASTING_CONFIG.maxPoint) {
        return toolError({
          code: 'INVALID_POINT',
          message: `Point forecast must be between ${FORECASTING_CONFIG.minPoint} and ${FORECASTING_CONFIG.maxPoint}, got ${point_forecast}`,
          retryable: true,
        });
      }
      try {
        const response = await client.submitForecast({ forecastId: forecast_id, point: point_forecast, reason });
        const result = jsonOutput(response);
        return { ...result, output: `Forecast ${forecast_id} updated to ${point_forecast}.\n${result.output ?? ''}` };
      } catch (error) {
        return apiError(error);
      }
    },
  });
}
