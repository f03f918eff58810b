import * as fs from 'fs/promises';
import * as path from 'path';
import crypto from 'crypto';
import sharp from 'sharp';
import type { ImageRegion, Photograph, PhotoSource, RegionSpec } from './types.js';
import { fitLongestEdge, regionRectangle } from './regions.js';
import { logger } from '../utils/logger.js';

const EXTENSIONS: ReadonlyArray<{ ext: string; mimeType: string }> = [
  { ext: '.png', mimeType: 'image/png' },
  { ext: '.jpg', mimeType: 'image/jpeg' },
  { ext: '.jpeg', mimeType: 'image/jpeg' },
];

const SAFE_ID = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/;

/**
 * Reads `<directory>/<subjectId>.{png,jpg,jpeg}` and crops regions with sharp
 */
export class LocalPhotoSource implements PhotoSource {
  constructor(private readonly directory: string) {}

  async getPhotograph(subjectId: string): Promise<Photograph | null> {
    if (!SAFE_ID.test(subjectId) || subjectId.includes('..')) {
      logger.warn(`Refusing photo lookup for unsafe subject id: ${JSON.stringify(subjectId)}`);
      return null;
    }

    for (const { ext, mimeType } of EXTENSIONS) {
      const filePath = path.join(this.directory, `${subjectId}${ext}`);
      let data: Buffer;
      try {
        data = await fs.readFile(filePath);
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          continue;
        }
        throw error;
      }

      const metadata = await sharp(data).metadata();
      if (!metadata.width || !metadata.height) {
        logger.warn(`Photo has no readable dimensions: ${filePath}`);
        return null;
      }

      return {
        subjectId,
        data,
        mimeType,
        width: metadata.width,
        height: metadata.height,
        hash: crypto.createHash('sha256').update(data).digest('hex').slice(0, 16),
      };
    }

    return null;
  }

  async crop(photo: Photograph, region: RegionSpec): Promise<ImageRegion> {
    const rect = regionRectangle(region.box, photo.width, photo.height);
    const target = fitLongestEdge(rect.width, rect.height);

    const data = await sharp(photo.data)
      .extract(rect)
      .resize({ width: target.width, height: target.height, fit: 'fill' })
      .jpeg({ quality: 90 })
      .toBuffer();

    return { name: region.name, data, mimeType: 'image/jpeg', width: target.width, height: target.height };
  }
}
