/**
 * Command-line driver: download tiles into the cache, bundle them, or both
 */

import { parseArgs } from 'node:util';
import type { RunSummary, TileScope } from '@/models';
import { AreaCalculator } from './lib/area-calculator';
import { BundleAssembler } from './lib/bundle-assembler';
import { parseBboxArg, resolveConfig, type ConfigInput } from './lib/config';
import { CountryRegistry } from './lib/country-registry';
import { DownloadManager } from './lib/download-manager';
import { errorMessage, TileBundlerError } from './lib/errors';
import { logger } from './lib/logger';
import { formatProgressLine } from './lib/progress-tracker';
import { planRegion, type RegionPlan } from './lib/region-plan';
import { StorageManager } from './lib/storage-manager';
import { TileFetcher } from './lib/tile-fetcher';
import { formatBytes, tileKey, WORLD_MAX_ZOOM } from './lib/tile-utils';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_INCOMPLETE = 2;

const COMMANDS = ['download', 'bundle', 'all'] as const;
type Command = typeof COMMANDS[number];

// Failed or missing addresses listed before the output is cut short
const LIST_LIMIT = 10;

const USAGE = `
Usage: tile-bundler [download|bundle|all] [options]

Commands:
  download                 Fetch tiles into the cache
  bundle                   Zip cached tiles (never fetches)
  all                      Download, then bundle (default)

Options:
  --country <code>         ISO 3166-1 alpha-2 code, e.g. SG (omit for
                           a world-only run up to zoom 6)
  --bbox=<box>             minLon,minLat,maxLon,maxLat (overrides --country);
                           keep the "=" so negative values parse
  --name <region>          Cache region name (default: country code)
  --minzoom <n>            Minimum zoom level, 0-15 (default 0)
  --maxzoom <n>            Maximum zoom level, 0-15 (default 15)
  --threads <n>            Concurrent downloads (default 4)
  --ttl <hours>            Re-download tiles older than this (default 168)
  --url <template>         Tile URL with {z}, {x}, {y}
  --cache-dir <path>       Cache directory (default ./cache)
  --output <path>          Archive path (default ./map_bundle.zip)
  --help                   Show this help

Environment:
  TILE_BUNDLER_DEBUG=1     Verbose logging
`;

export interface CliOptions {
  countries?: CountryRegistry;   // Defaults to the bundled country file
  signal?: AbortSignal;          // Stops dispatching new downloads
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      country: { type: 'string' },
      bbox: { type: 'string' },
      name: { type: 'string' },
      minzoom: { type: 'string' },
      maxzoom: { type: 'string' },
      threads: { type: 'string' },
      ttl: { type: 'string' },
      url: { type: 'string' },
      'cache-dir': { type: 'string' },
      output: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    logger.error(errorMessage(error));
    console.log(USAGE);
    return EXIT_FATAL;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const command = positionals[0] ?? 'all';
  if (!isCommand(command) || positionals.length > 1) {
    logger.error(`Unknown command: ${positionals.join(' ')}`);
    console.log(USAGE);
    return EXIT_FATAL;
  }

  try {
    const input: ConfigInput = {
      country: values.country,
      bbox: values.bbox !== undefined ? parseBboxArg(values.bbox) : undefined,
      name: values.name,
      minZoom: values.minzoom,
      maxZoom: values.maxzoom,
      concurrency: values.threads,
      ttlHours: values.ttl,
      tileUrl: values.url,
      cacheDir: values['cache-dir'],
      output: values.output,
    };
    const settings = resolveConfig(input);
    const countries = options.countries ?? await CountryRegistry.load();
    const plan = planRegion(settings, countries);
    const storage = new StorageManager({ rootDir: settings.cacheDir, region: plan.regionName });

    let exitCode = EXIT_OK;

    if (command !== 'bundle') {
      const fetcher = new TileFetcher({
        urlTemplate: settings.tileUrl,
        maxAttempts: settings.maxAttempts,
        retryDelay: settings.retryDelay,
        timeout: settings.timeout,
      });
      const summary = await download(plan, storage, fetcher, settings.concurrency, settings.ttlHours, options.signal);

      if (summary.cancelled) {
        logger.warn('Download cancelled');
        return EXIT_INCOMPLETE;
      }
      if (summary.failed > 0) exitCode = EXIT_INCOMPLETE;
    }

    if (command !== 'download') {
      const assembler = new BundleAssembler(storage);
      const result = await assembler.assemble(plan.layers, settings.output);

      if (result.status === 'complete') {
        logger.info(`Archive complete: ${result.archivePath} (${result.entryCount} tiles, ${formatBytes(result.bytes)})`);
      } else {
        const shown = result.missing.slice(0, LIST_LIMIT).map(tileKey).join(', ');
        const more = result.missing.length > LIST_LIMIT ? `, +${result.missing.length - LIST_LIMIT} more` : '';
        logger.warn(`Archive partial: ${result.archivePath} is missing ${result.missing.length} tile(s): ${shown}${more}`);
        exitCode = EXIT_INCOMPLETE;
      }
    }

    return exitCode;
  } catch (error) {
    if (error instanceof TileBundlerError) {
      logger.error(`${error.code}: ${error.message}`);
    } else {
      logger.error('Unexpected error:', error);
    }
    return EXIT_FATAL;
  }
}

async function download(
  plan: RegionPlan,
  storage: StorageManager,
  fetcher: TileFetcher,
  concurrency: number,
  ttlHours: number,
  signal?: AbortSignal
): Promise<RunSummary> {
  const regionLabel = plan.regionName.toUpperCase();
  const zoomTotals = AreaCalculator.countTilesByZoom(plan.layers);
  const total = AreaCalculator.countTiles(plan.layers);

  for (const layer of plan.layers) {
    logger.info(`Queued ${describeLayer(layer, regionLabel)}`);
  }

  const manager = new DownloadManager({
    fetcher,
    storage,
    onProgress: (progress) => {
      const label = progress.zoom <= WORLD_MAX_ZOOM ? 'World' : regionLabel;
      logger.info(formatProgressLine(progress, label));
    },
  });

  const summary = await manager.run(AreaCalculator.enumerateScope(plan.layers), {
    concurrency,
    ttlHours,
    signal,
    total,
    zoomTotals,
  });

  logger.info(
    `Download finished: ${summary.succeeded} downloaded, ${summary.skipped} cached, ` +
    `${summary.failed} failed in ${(summary.durationMs / 1000).toFixed(1)}s`
  );

  if (summary.failed > 0) {
    const shown = summary.failedAddresses.slice(0, LIST_LIMIT).map(tileKey).join(', ');
    const more = summary.failed > LIST_LIMIT ? `, +${summary.failed - LIST_LIMIT} more` : '';
    logger.warn(`Failed tiles: ${shown}${more}`);
  }

  return summary;
}

function describeLayer(layer: TileScope, regionLabel: string): string {
  const name = layer.maxZoom <= WORLD_MAX_ZOOM ? 'world' : regionLabel;
  const count = AreaCalculator.countTiles(layer);
  return `${name} tiles (zoom ${layer.minZoom}-${layer.maxZoom}, ${count} tiles)`;
}
