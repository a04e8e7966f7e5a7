import type { Credential, MetadataValue } from '../../domain/entities/Target.js';

/**
 * Host entry as read from an inventory source, before defaults and validation
 */
export interface InventoryRecord {
  name: string;
  host: string;
  user: string | null;
  port: number | null;
  relay: string | null;
  credential: Credential | null;
  metadata: Record<string, MetadataValue>;
  /** Where the entry came from, for error messages (e.g. "hosts:4") */
  origin: string;
}

export interface ParsedInventory {
  records: InventoryRecord[];
  defaults: Omit<InventoryRecord, 'name' | 'host' | 'origin'>;
}

export function emptyDefaults(): ParsedInventory['defaults'] {
  return { user: null, port: null, relay: null, credential: null, metadata: {} };
}

export function coerceMetadataValue(raw: string): MetadataValue {
  if (/^-?\d+$/.test(raw) && Number.isSafeInteger(Number(raw))) {
    return Number(raw);
  }
  if (raw === 'true' || raw === 'false') {
    return raw === 'true';
  }
  return raw;
}
