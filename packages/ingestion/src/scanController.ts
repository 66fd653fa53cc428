import type { Request, Response } from 'express';
import { ValidationError, scoreUpload } from '@riskscan/core';
import type { GpsCoordinates, Logger } from '@riskscan/core';
import { isRecord } from '@riskscan/oauth';
import { sendError } from './http.js';

function readGps(value: unknown): GpsCoordinates | null {
  if (value === undefined || value === null) return null;
  if (isRecord(value)) {
    const latitude = value['latitude'];
    const longitude = value['longitude'];
    if (typeof latitude === 'number' && typeof longitude === 'number') {
      return { latitude, longitude };
    }
  }
  throw new ValidationError('gps must be an object with numeric latitude and longitude');
}

function readCaption(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value;
  throw new ValidationError('caption must be a string');
}

/**
 * Create the direct-upload scan handler. Nothing is stored.
 */
export function createScanController(logger: Logger) {
  return {
    /**
     * POST /scan
     * Body: `{ caption?: string, gps?: { latitude, longitude } }`
     */
    scan(req: Request, res: Response): void {
      try {
        const body: unknown = req.body;
        if (!isRecord(body)) {
          throw new ValidationError('Request body must be a JSON object');
        }

        res.json(scoreUpload(readCaption(body['caption']), readGps(body['gps'])));
      } catch (err) {
        sendError(res, err, logger);
      }
    },
  };
}
