import * as path from 'path';
import sharp from 'sharp';
import { errorMessage } from '../../shared/helpers';

export const ALLOWED_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'];
export const MAX_IMAGE_WIDTH = 400;
export const IMAGE_CONTENT_TYPE = 'image/jpeg';

export class InvalidImageError extends Error {
  constructor(reason: string) {
    super(`Invalid image: ${reason}`);
    this.name = 'InvalidImageError';
  }
}

export const isAllowedImageFile = (fileName: string): boolean =>
  ALLOWED_IMAGE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());

export const dishImageFileName = (menuItemId: number): string =>
  `${menuItemId}.jpg`;

/**
 * Decodes any image sharp understands and re-encodes it as a JPEG no wider
 * than {@link MAX_IMAGE_WIDTH}. EXIF orientation is applied first.
 */
export const normalizeDishImage = async (input: Buffer): Promise<Buffer> => {
  try {
    return await sharp(input)
      .rotate()
      .resize({ width: MAX_IMAGE_WIDTH, withoutEnlargement: true })
      .jpeg({ quality: 80 })
      .toBuffer();
  } catch (error) {
    throw new InvalidImageError(errorMessage(error));
  }
};
