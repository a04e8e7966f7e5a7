import { z } from 'zod';
import { InventoryError } from '../../domain/errors.js';
import { emptyDefaults, type InventoryRecord, type ParsedInventory } from './InventoryRecord.js';

const credentialSchema = z.union([
  z.object({ type: z.literal('agent') }),
  z.object({ type: z.literal('key'), path: z.string().min(1) }),
  z.object({ type: z.literal('password'), env: z.string().min(1) }),
  z.object({ type: z.literal('password'), secret: z.string().min(1) }),
]);

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const portSchema = z.number().int().min(1).max(65535);

const targetSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  user: z.string().min(1).optional(),
  port: portSchema.optional(),
  relay: z.string().min(1).optional(),
  credential: credentialSchema.optional(),
  metadata: metadataSchema.optional(),
});

const inventorySchema = z.object({
  defaults: z
    .object({
      user: z.string().min(1).optional(),
      port: portSchema.optional(),
      relay: z.string().min(1).optional(),
      credential: credentialSchema.optional(),
      metadata: metadataSchema.optional(),
    })
    .optional(),
  targets: z.array(targetSchema),
});

/**
 * Parses a JSON inventory: `{ defaults?, targets: [{ name, host, ... }] }`
 */
export function parseJsonInventory(content: string, options: { sourceName: string }): ParsedInventory {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new InventoryError(`Inventory ${options.sourceName} is not valid JSON`, { error });
  }

  const result = inventorySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InventoryError(`Inventory ${options.sourceName} is malformed: ${issues.join('; ')}`, {
      issues,
    });
  }

  const defaults = emptyDefaults();
  const declared = result.data.defaults;
  if (declared) {
    defaults.user = declared.user ?? null;
    defaults.port = declared.port ?? null;
    defaults.relay = declared.relay ?? null;
    defaults.credential = declared.credential ?? null;
    defaults.metadata = { ...declared.metadata };
  }

  const records: InventoryRecord[] = result.data.targets.map((entry, index) => ({
    name: entry.name,
    host: entry.host,
    user: entry.user ?? null,
    port: entry.port ?? null,
    relay: entry.relay ?? null,
    credential: entry.credential ?? null,
    metadata: { ...entry.metadata },
    origin: `${options.sourceName}#targets[${index}]`,
  }));

  return { records, defaults };
}
