import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { z } from 'zod';
import {
  SETTING_RANGES,
  describeRange,
  getAllSettings,
  getSetting,
  isWithinRange,
  updateSetting
} from '../lib/db/queries/settings';
import { NotFoundError, ValidationError } from '../lib/errors';
import { asyncHandler } from '../middleware/error-handler';
import { parseWith } from './params';

const router: RouterType = Router();

const updateSettingSchema = z.object({
  value: z.union([z.string(), z.number(), z.boolean()])
});

router.get(
  '/',
  asyncHandler(async (_req, res) => {
    res.json(getAllSettings());
  })
);

router.get(
  '/:key',
  asyncHandler(async (req, res) => {
    const setting = getSetting(req.params.key);
    if (!setting) {
      throw new NotFoundError(`Setting '${req.params.key}' not found`);
    }
    res.json(setting);
  })
);

router.put(
  '/:key',
  asyncHandler(async (req, res) => {
    const { key } = req.params;
    const { value } = parseWith(updateSettingSchema, req.body, 'Value is required');

    const existing = getSetting(key);
    if (!existing) {
      throw new NotFoundError(`Setting '${key}' not found`);
    }
    if (existing.type === 'number') {
      const num = Number(value);
      if (String(value).trim() === '' || isNaN(num)) {
        throw new ValidationError(`Setting '${key}' must be a number`);
      }
      const range = SETTING_RANGES[key];
      if (range && !isWithinRange(num, range)) {
        throw new ValidationError(`Setting '${key}' must be ${describeRange(range)}`, {
          details: { value: num, ...range }
        });
      }
    }

    const updated = updateSetting(key, value);
    console.log(`[Settings] Updated: ${key}`);
    res.json(updated);
  })
);

export { router as settingsRouter };
