/**
 * Persisted per-day word totals.
 */

import { dirname } from 'node:path';
import { z } from 'zod/mini';
import type { FileSystem } from './filesystem.ts';
import type { DailyTotals } from '../store/features/stats.ts';
import { err, ioError, ok, type Logger, type Result } from '../types/errors.ts';

const StatsFileSchema = z.object({
  days: z.record(
    z.string().check(z.regex(/^\d{4}-\d{2}-\d{2}$/)),
    z.int().check(z.gte(0))
  ),
});

export type StatsFile = z.infer<typeof StatsFileSchema>;

const decoder = new TextDecoder('utf-8');
const encoder = new TextEncoder();

function parseStats(text: string): StatsFile | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = StatsFileSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Read the totals. A missing file is an empty history; a file that does
 * not parse is logged and treated as empty so the next save replaces it.
 */
export function loadStats(
  fs: FileSystem,
  path: string,
  logger: Logger = console
): Result<DailyTotals> {
  if (!fs.exists(path)) return ok({});

  let text: string;
  try {
    text = decoder.decode(fs.readFile(path));
  } catch (error) {
    return err(ioError('read stats', path, error));
  }

  const stats = parseStats(text);
  if (stats === null) {
    logger.warn(`Ignoring unreadable stats file ${path}`);
    return ok({});
  }
  return ok(stats.days);
}

export function saveStats(fs: FileSystem, path: string, days: DailyTotals): Result<void> {
  const temp = `${path}.tmp`;
  const body: StatsFile = { days: { ...days } };
  try {
    const directory = dirname(path);
    if (!fs.exists(directory)) {
      fs.mkdir(directory);
    }
    fs.writeFile(temp, encoder.encode(JSON.stringify(body, null, 2) + '\n'));
    fs.rename(temp, path);
    return ok(undefined);
  } catch (error) {
    return err(ioError('write stats', path, error));
  }
}
