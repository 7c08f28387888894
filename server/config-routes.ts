import { Router } from 'express';
import { isDeepStrictEqual } from 'util';
import { createLogger } from './logger';
import type { SettingsStore } from './settings-store';

const configLogger = createLogger('Config');

/** Sections whose changes apply without restarting the gateway. */
const LIVE_SECTIONS = new Set(['player_settings']);

export interface SaveConfigResult {
  success: boolean;
  restart_required: boolean;
  settings_changed: boolean;
}

export function createConfigRouter(settings: SettingsStore): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(settings.all());
  });

  /**
   * POST /api/config/:key/:subkey
   *
   * Body is the new value. Only existing entries can be changed.
   */
  router.post('/:key/:subkey', async (req, res) => {
    const { key, subkey } = req.params;
    const newValue: unknown = req.body;
    configLogger.debug(`save config called for ${key}/${subkey} - new value: ${JSON.stringify(newValue)}`);

    if (!settings.has(key, subkey)) {
      return res.status(404).json({ error: `Unknown config entry: ${key}/${subkey}` });
    }

    const result: SaveConfigResult = {
      success: true,
      restart_required: false,
      settings_changed: false,
    };
    const previousValue = settings.get(key, subkey);
    if (isDeepStrictEqual(previousValue, newValue)) {
      return res.json(result);
    }

    try {
      settings.set(key, subkey, newValue);
      await settings.save();
    } catch (error) {
      settings.set(key, subkey, previousValue);
      configLogger.error(`Failed to save config ${key}/${subkey}`, error);
      return res.status(500).json({ error: 'Failed to save config' });
    }

    result.settings_changed = true;
    result.restart_required = !LIVE_SECTIONS.has(key);
    res.json(result);
  });

  return router;
}
