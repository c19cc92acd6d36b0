/**
 * HTTP client for the forecasting service.
 *
 * Public endpoints are called anonymously; submitting a point logs in first
 * and reuses the bearer token until the service rejects it.
 */

import { z } from 'zod';
import { FORECASTING_CONFIG } from '../config.js';

export interface ForecastingClientOptions {
  baseUrl: string;
  /** Account whose open forecasts and points are listed */
  userId: number;
  username?: string;
  password?: string;
  timeoutMs?: number;
  /** Injected in tests */
  fetch?: typeof fetch;
}

export interface ForecastSubmission {
  forecastId: number;
  point: number;
  reason: string;
}

export class ForecastingApiError extends Error {
  constructor(
    readonly status: number,
    readonly path: string,
    readonly body: string,
  ) {
    super(`Forecasting API ${path} responded ${status}${body ? `: ${body.slice(0, 300)}` : ''}`);
    this.name = 'ForecastingApiError';
  }
}

const LoginResponseSchema = z.object({ token: z.string().min(1) });

export class ForecastingClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private token: string | null = null;

  constructor(private readonly options: ForecastingClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? FORECASTING_CONFIG.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  listForecasts(): Promise<unknown> {
    return this.request('GET', `forecasts/stale-and-new/${this.options.userId}`);
  }

  getForecast(forecastId: number): Promise<unknown> {
    return this.request('GET', `forecasts/${forecastId}`);
  }

  getForecastPoints(forecastId: number): Promise<unknown> {
    return this.request('POST', 'forecast-points/user', {
      forecast_id: forecastId,
      user_id: this.options.userId,
    });
  }

  async submitForecast(submission: ForecastSubmission): Promise<unknown> {
    const body = {
      forecast_id: submission.forecastId,
      point_forecast: submission.point,
      reason: submission.reason,
    };
    try {
      return await this.request('POST', 'api/forecast-points', body, await this.getToken());
    } catch (error) {
      if (!(error instanceof ForecastingApiError) || error.status !== 401) {
        throw error;
      }
      // Stale token: log in again once
      this.token = null;
      return this.request('POST', 'api/forecast-points', body, await this.getToken());
    }
  }

  private async getToken(): Promise<string> {
    if (this.token) {
      return this.token;
    }
    if (!this.options.username || !this.options.password) {
      throw new Error('Forecasting credentials are not configured (BOT_USERNAME / BOT_PASSWORD)');
    }
    const response = await this.request('POST', 'users/login', {
      username: this.options.username,
      password: this.options.password,
    });
    const parsed = LoginResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new Error('Forecasting login response did not contain a token');
    }
    this.token = parsed.data.token;
    return this.token;
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown, token?: string): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const response = await this.fetchImpl(`${this.baseUrl}/${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new ForecastingApiError(response.status, path, text);
    }
    if (!text) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
}
