import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { InventoryError } from '../domain/errors.js';
import {
  createTarget,
  isReservedTargetName,
  TARGET_NAME_PATTERN,
  type Target,
} from '../domain/entities/Target.js';
import type { InventoryRecord, ParsedInventory } from '../infra/inventory/InventoryRecord.js';
import { parseIniInventory } from '../infra/inventory/parseIniInventory.js';
import { parseJsonInventory } from '../infra/inventory/parseJsonInventory.js';
import { logger } from '../infra/logger.js';

export interface InventorySource {
  path: string;
  format?: 'auto' | 'json' | 'ini';
  /** Host group read from INI inventories */
  group?: string;
  /** Relay applied to every target, replacing whatever the inventory declares */
  relay?: string | null;
}

const previousSummarySchema = z.object({
  runId: z.string(),
  failedTargets: z.array(z.string()),
});

/**
 * TargetRegistry - loads and validates the ordered target list.
 * Performs no network activity.
 */
export class TargetRegistry {
  async load(source: InventorySource): Promise<Target[]> {
    const sourceName = path.basename(source.path);
    const content = await this.readSource(source.path);
    const format = resolveFormat(source);

    const parsed =
      format === 'json'
        ? parseJsonInventory(content, { sourceName })
        : parseIniInventory(content, { group: source.group ?? 'deployment_boxes', sourceName });

    const targets = this.buildTargets(parsed, source.relay ?? null);
    logger.info('Inventory loaded', { path: source.path, format, targets: targets.length });
    return targets;
  }

  /**
   * Returns the named targets in inventory order.
   * An empty name list selects every target.
   */
  select(targets: Target[], names: string[]): Target[] {
    if (names.length === 0) {
      return targets;
    }
    const known = new Set(targets.map((t) => t.name));
    const unknown = names.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new InventoryError(`Unknown target(s): ${unknown.join(', ')}`, { unknown });
    }
    const wanted = new Set(names);
    return targets.filter((t) => wanted.has(t.name));
  }

  /**
   * Reads the failed target names recorded in a previous run's summary file
   */
  async readFailedTargets(summaryPath: string): Promise<string[]> {
    const content = await this.readSource(summaryPath);
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new InventoryError(`Summary ${summaryPath} is not valid JSON`, { error });
    }
    const result = previousSummarySchema.safeParse(raw);
    if (!result.success) {
      throw new InventoryError(`Summary ${summaryPath} has no failedTargets list`);
    }
    logger.info('Selecting failed targets from previous run', {
      runId: result.data.runId,
      failed: result.data.failedTargets.length,
    });
    return result.data.failedTargets;
  }

  private async readSource(filePath: string): Promise<string> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new InventoryError(`Cannot read ${filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private buildTargets(parsed: ParsedInventory, relayOverride: string | null): Target[] {
    if (parsed.records.length === 0) {
      throw new InventoryError('Inventory contains no targets');
    }

    const seen = new Map<string, string>();
    return parsed.records.map((record) => {
      this.assertName(record, seen);
      const user = record.user ?? parsed.defaults.user;
      const relay = relayOverride ?? record.relay ?? parsed.defaults.relay;

      if (!user) {
        throw new InventoryError(`Target ${record.name} (${record.origin}) has no user`);
      }
      if (!relay) {
        throw new InventoryError(`Target ${record.name} (${record.origin}) has no relay host`);
      }

      return createTarget({
        name: record.name,
        destination: { host: record.host, user, port: record.port ?? parsed.defaults.port },
        relay,
        credential: record.credential ?? parsed.defaults.credential ?? { type: 'agent' },
        metadata: { ...parsed.defaults.metadata, ...record.metadata },
      });
    });
  }

  private assertName(record: InventoryRecord, seen: Map<string, string>): void {
    if (!TARGET_NAME_PATTERN.test(record.name)) {
      throw new InventoryError(`Invalid target name "${record.name}" (${record.origin})`);
    }
    if (isReservedTargetName(record.name)) {
      throw new InventoryError(
        `Target name "${record.name}" (${record.origin}) is reserved for run logs; rename the target`
      );
    }
    const previous = seen.get(record.name);
    if (previous) {
      throw new InventoryError(
        `Duplicate target "${record.name}" (${record.origin}, first at ${previous})`,
        { name: record.name }
      );
    }
    seen.set(record.name, record.origin);
  }
}

function resolveFormat(source: InventorySource): 'json' | 'ini' {
  if (source.format && source.format !== 'auto') {
    return source.format;
  }
  return path.extname(source.path).toLowerCase() === '.json' ? 'json' : 'ini';
}
