import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { HTTPException } from 'hono/http-exception';
import type { SettingsResponse, UpdateSettingsResponse } from '@gpuscope/shared';
import type { AppDeps } from '../hono-app';
import { validationHook } from '../lib/validation';
import { InvalidThresholdsError, thresholdsOverrideSchema } from '../services/thresholds';

export function createSettingsRoutes({ config }: AppDeps) {
  return new Hono()
    .get('/', async (c) => {
      const [thresholds, overrides] = await Promise.all([config.getThresholds(), config.getOverrides()]);
      const response: SettingsResponse = { thresholds, overrides };
      return c.json(response);
    })
    .put('/', zValidator('json', thresholdsOverrideSchema, validationHook), async (c) => {
      const update = c.req.valid('json');

      try {
        const response: UpdateSettingsResponse = {
          message: 'Settings updated successfully',
          thresholds: await config.updateOverrides(update),
        };
        return c.json(response);
      } catch (error) {
        if (error instanceof InvalidThresholdsError) {
          throw new HTTPException(400, { message: error.message });
        }
        throw error;
      }
    })
    .post('/reset', async (c) => {
      const response: UpdateSettingsResponse = {
        message: 'Settings reset to defaults',
        thresholds: await config.reset(),
      };
      return c.json(response);
    });
}
