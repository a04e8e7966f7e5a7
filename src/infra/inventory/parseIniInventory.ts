import { InventoryError } from '../../domain/errors.js';
import type { Credential } from '../../domain/entities/Target.js';
import {
  coerceMetadataValue,
  emptyDefaults,
  type InventoryRecord,
  type ParsedInventory,
} from './InventoryRecord.js';

type Section = { group: string; kind: 'hosts' | 'vars' | 'children' };

/**
 * Parses one host group of an Ansible INI inventory.
 *
 * Host lines look like `name ansible_host=10.0.0.5 ansible_user=lab network_id=3`.
 * The `[group:vars]` section supplies defaults; the relay is read from `-J` or
 * `ProxyJump=` inside `ansible_ssh_common_args`. Other groups are ignored.
 */
export function parseIniInventory(
  content: string,
  options: { group: string; sourceName: string }
): ParsedInventory {
  const records: InventoryRecord[] = [];
  const groupVars: Record<string, string> = {};
  let section: Section | null = null;
  let groupSeen = false;

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    const origin = `${options.sourceName}:${index + 1}`;

    if (!line || line.startsWith('#') || line.startsWith(';')) {
      return;
    }

    if (line.startsWith('[')) {
      if (!line.endsWith(']')) {
        throw new InventoryError(`Malformed section header at ${origin}: ${line}`);
      }
      section = parseSectionHeader(line.slice(1, -1).trim());
      if (section.group === options.group && section.kind === 'hosts') {
        groupSeen = true;
      }
      return;
    }

    if (!section || section.group !== options.group) {
      return;
    }

    if (section.kind === 'vars') {
      const [key, value] = splitAssignment(line, origin);
      groupVars[key] = value;
      return;
    }

    if (section.kind === 'hosts') {
      records.push(parseHostLine(line, origin));
    }
  });

  if (!groupSeen) {
    throw new InventoryError(`Inventory group [${options.group}] not found in ${options.sourceName}`);
  }

  const defaults = emptyDefaults();
  defaults.user = groupVars.ansible_user ?? null;
  defaults.port = groupVars.ansible_port ? parsePort(groupVars.ansible_port, `[${options.group}:vars]`) : null;
  defaults.relay = extractRelay(groupVars.ansible_ssh_common_args);
  defaults.credential = credentialFromVars(groupVars);
  for (const [key, value] of Object.entries(groupVars)) {
    if (!key.startsWith('ansible_')) {
      defaults.metadata[key] = coerceMetadataValue(value);
    }
  }

  return { records, defaults };
}

function parseSectionHeader(header: string): Section {
  const [group, suffix] = header.split(':', 2);
  if (suffix === 'vars') {
    return { group, kind: 'vars' };
  }
  if (suffix === 'children') {
    return { group, kind: 'children' };
  }
  return { group, kind: 'hosts' };
}

function parseHostLine(line: string, origin: string): InventoryRecord {
  const [name, ...assignments] = tokenize(line, origin);
  const vars: Record<string, string> = {};
  for (const token of assignments) {
    const [key, value] = splitAssignment(token, origin);
    vars[key] = value;
  }

  const metadata: InventoryRecord['metadata'] = {};
  for (const [key, value] of Object.entries(vars)) {
    if (!key.startsWith('ansible_')) {
      metadata[key] = coerceMetadataValue(value);
    }
  }

  return {
    name,
    host: vars.ansible_host ?? name,
    user: vars.ansible_user ?? null,
    port: vars.ansible_port ? parsePort(vars.ansible_port, origin) : null,
    relay: extractRelay(vars.ansible_ssh_common_args),
    credential: credentialFromVars(vars),
    metadata,
    origin,
  };
}

/**
 * Splits on whitespace, keeping single- or double-quoted values together
 */
function tokenize(line: string, origin: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (const char of line) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (/\s/.test(char)) {
      if (current) {
        tokens.push(current);
        current = '';
      }
    } else {
      current += char;
    }
  }

  if (quote) {
    throw new InventoryError(`Unterminated quote at ${origin}`);
  }
  if (current) {
    tokens.push(current);
  }
  return tokens;
}

function splitAssignment(text: string, origin: string): [string, string] {
  const index = text.indexOf('=');
  if (index <= 0) {
    throw new InventoryError(`Expected key=value at ${origin}: ${text}`);
  }
  return [text.slice(0, index).trim(), unquote(text.slice(index + 1).trim())];
}

function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}

function parsePort(value: string, origin: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InventoryError(`Invalid ansible_port "${value}" at ${origin}`);
  }
  return port;
}

export function extractRelay(sshArgs: string | undefined): string | null {
  if (!sshArgs) {
    return null;
  }
  const match = sshArgs.match(/(?:^|\s)-J\s*([^\s'"]+)/) ?? sshArgs.match(/ProxyJump=([^\s'"]+)/);
  return match ? match[1] : null;
}

function credentialFromVars(vars: Record<string, string>): Credential | null {
  if (vars.ansible_ssh_private_key_file) {
    return { type: 'key', path: vars.ansible_ssh_private_key_file };
  }
  const password = vars.ansible_password ?? vars.ansible_ssh_pass;
  if (password) {
    return { type: 'password', secret: password };
  }
  return null;
}
