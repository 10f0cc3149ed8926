/**
 * Country bounding boxes keyed by ISO 3166-1 alpha-2 code
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { BoundingBox } from '@/models';
import { ConfigurationError, errorMessage, TileBundlerError } from './errors';

export const DEFAULT_COUNTRY_FILE = fileURLToPath(new URL('../../data/country-bbox.json', import.meta.url));

const CountryBoxSchema = z.object({
  min_lat: z.number(),
  max_lat: z.number(),
  min_lon: z.number(),
  max_lon: z.number(),
});

const CountryFileSchema = z.record(CountryBoxSchema);

export type CountryFile = z.infer<typeof CountryFileSchema>;

export class CountryRegistry {
  private boxes = new Map<string, BoundingBox>();

  constructor(data: CountryFile) {
    for (const [code, box] of Object.entries(data)) {
      this.boxes.set(code.toUpperCase(), {
        minLat: box.min_lat,
        maxLat: box.max_lat,
        minLon: box.min_lon,
        maxLon: box.max_lon,
      });
    }
  }

  /**
   * Read and validate a country file (defaults to the bundled one)
   */
  static async load(path: string = DEFAULT_COUNTRY_FILE): Promise<CountryRegistry> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new TileBundlerError('InvalidConfig', `Cannot read country file ${path}: ${errorMessage(error)}`, { path }, { cause: error });
    }

    const parseResult = CountryFileSchema.safeParse(raw);
    if (!parseResult.success) {
      const issues = parseResult.error.issues.map((issue) => `${issue.path.join('.') || 'root'} ${issue.message}`);
      throw new ConfigurationError(`Invalid country file ${path}`, issues);
    }

    return new CountryRegistry(parseResult.data);
  }

  /**
   * Bounding box for a country code (case-insensitive)
   * @throws ConfigurationError with code UnknownCountry
   */
  resolve(code: string): BoundingBox {
    const box = this.boxes.get(code.toUpperCase());
    if (!box) {
      const known = this.codes();
      const issues = known.length > 0 ? [`known codes: ${known.join(', ')}`] : [];
      throw new ConfigurationError(`Unknown country code "${code}"`, issues, 'UnknownCountry');
    }
    return { ...box };
  }

  /**
   * Known codes, sorted
   */
  codes(): string[] {
    return [...this.boxes.keys()].sort();
  }
}
