import { readdir } from 'fs/promises';
import * as path from 'path';
import { describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('icons');

/**
 * PNG icons keyed by file stem, which matches a marker category
 */
export class IconLibrary {
  constructor(private readonly icons: Map<string, string> = new Map()) {}

  static async load(iconDir: string): Promise<IconLibrary> {
    const icons = new Map<string, string>();
    try {
      for (const file of await readdir(iconDir)) {
        if (path.extname(file).toLowerCase() !== '.png') continue;
        icons.set(path.basename(file, path.extname(file)), path.join(iconDir, file));
      }
      logger.info(`Loaded ${icons.size} icon paths`, { iconDir });
    } catch (error) {
      logger.error('Icon directory not readable; maps will have no markers', {
        iconDir,
        error: describeError(error),
      });
    }
    return new IconLibrary(icons);
  }

  get size(): number {
    return this.icons.size;
  }

  /**
   * Icon for a category, falling back to its singular form ("koroks" -> "korok")
   */
  resolve(category: string): string | null {
    const direct = this.icons.get(category);
    if (direct) return direct;
    if (category.endsWith('s')) {
      return this.icons.get(category.slice(0, -1)) ?? null;
    }
    return null;
  }
}
