/**
 * Target entity - one independently addressed host provisioned during a run.
 * Immutable once loaded from the inventory.
 */
export type MetadataValue = string | number | boolean;

export type Credential =
  | { type: 'agent' }
  | { type: 'key'; path: string }
  | { type: 'password'; env: string }
  | { type: 'password'; secret: string };

export interface Destination {
  host: string;
  user: string;
  port: number | null;
}

export interface Target {
  readonly name: string;
  readonly destination: Readonly<Destination>;
  readonly relay: string;
  readonly credential: Readonly<Credential>;
  readonly metadata: Readonly<Record<string, MetadataValue>>;
}

export const TARGET_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Names whose `<name>_<stamp>.log` would collide with the combined run log
 * or a preflight step's log in the same directory
 */
export function isReservedTargetName(name: string): boolean {
  return name === 'run' || name.startsWith('preflight-');
}

export function createTarget(params: {
  name: string;
  destination: Destination;
  relay: string;
  credential: Credential;
  metadata?: Record<string, MetadataValue>;
}): Target {
  return Object.freeze({
    name: params.name,
    destination: Object.freeze({ ...params.destination }),
    relay: params.relay,
    credential: Object.freeze({ ...params.credential }),
    metadata: Object.freeze({ ...(params.metadata ?? {}) }),
  });
}

/**
 * `user@host` or `user@host:port`, as shown in progress lines
 */
export function formatDestination(destination: Destination): string {
  const base = `${destination.user}@${destination.host}`;
  return destination.port === null ? base : `${base}:${destination.port}`;
}
