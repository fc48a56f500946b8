import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import axios from 'axios';
import { promises as fs } from 'fs';
import * as path from 'path';
import { envValidationSchema } from '../config/env.validation';
import { normalizeDishImage } from '../menu/helpers';
import { errorMessage } from '../shared/helpers';
import defaultImages from './data/default-images.json';

const DOWNLOAD_TIMEOUT_MS = 15000;

export interface IImageSource {
  file: string;
  url: string;
}

export interface IDownloadReport {
  downloaded: string[];
  skipped: string[];
  failed: string[];
}

const logger = new Logger('DownloadImages');

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const resolveImagesDir = (
  env: NodeJS.ProcessEnv = process.env,
): string => {
  const { value, error } = envValidationSchema
    .extract('IMAGES_DIR')
    .validate(env.IMAGES_DIR);
  if (error) {
    throw error;
  }
  return path.resolve(String(value));
};

export const downloadImages = async (
  imagesDir: string,
  sources: IImageSource[] = defaultImages,
): Promise<IDownloadReport> => {
  const report: IDownloadReport = { downloaded: [], skipped: [], failed: [] };
  await fs.mkdir(imagesDir, { recursive: true });

  for (const { file, url } of sources) {
    const target = path.join(imagesDir, file);
    if (await fileExists(target)) {
      report.skipped.push(file);
      continue;
    }
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: DOWNLOAD_TIMEOUT_MS,
      });
      await fs.writeFile(
        target,
        await normalizeDishImage(Buffer.from(response.data)),
      );
      report.downloaded.push(file);
      logger.log(`downloaded ${file}`);
    } catch (error) {
      report.failed.push(file);
      logger.error(`failed to download ${file}: ${errorMessage(error)}`);
    }
  }
  return report;
};

if (require.main === module) {
  Promise.resolve()
    .then(() => downloadImages(resolveImagesDir()))
    .then(({ downloaded, skipped, failed }) =>
      logger.log(
        `done: ${downloaded.length} downloaded, ${skipped.length} skipped, ${failed.length} failed`,
      ),
    )
    .catch((error: unknown) => {
      logger.error(error);
      process.exit(1);
    });
}
