import { TemplateError } from '../domain/errors.js';
import type { Target } from '../domain/entities/Target.js';

type Segment = { type: 'text'; value: string } | { type: 'placeholder'; path: string };

const PLACEHOLDER_PATH = /^(name|host|user|port|relay|(meta|vars)\.[A-Za-z0-9_-]+)$/;
const SHELL_SAFE = /^[A-Za-z0-9@%+=:,./_-]+$/;

/**
 * CommandTemplate - remote command with `{{ placeholder }}` slots.
 *
 * Supported placeholders: `name`, `host`, `user`, `port`, `relay`,
 * `meta.<key>` (target metadata) and `vars.<key>` (run variables).
 * Substituted values are quoted for a POSIX shell.
 */
export class CommandTemplate {
  private constructor(
    readonly source: string,
    private readonly segments: Segment[]
  ) {}

  static compile(source: string): CommandTemplate {
    const segments: Segment[] = [];
    let cursor = 0;

    while (cursor < source.length) {
      const open = source.indexOf('{{', cursor);
      if (open === -1) {
        segments.push({ type: 'text', value: source.slice(cursor) });
        break;
      }
      if (open > cursor) {
        segments.push({ type: 'text', value: source.slice(cursor, open) });
      }
      const close = source.indexOf('}}', open + 2);
      if (close === -1) {
        throw new TemplateError(`Unterminated placeholder at offset ${open}`, { source });
      }
      const placeholder = source.slice(open + 2, close).trim();
      if (!PLACEHOLDER_PATH.test(placeholder)) {
        throw new TemplateError(`Unknown placeholder "{{${placeholder}}}"`, { source });
      }
      segments.push({ type: 'placeholder', path: placeholder });
      cursor = close + 2;
    }

    return new CommandTemplate(source, segments);
  }

  get placeholders(): string[] {
    return this.segments.flatMap((segment) => (segment.type === 'placeholder' ? [segment.path] : []));
  }

  render(target: Target, vars: Record<string, string> = {}): string {
    return this.segments
      .map((segment) =>
        segment.type === 'text' ? segment.value : shellQuote(resolve(segment.path, target, vars))
      )
      .join('');
  }
}

export function shellQuote(value: string): string {
  if (SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function resolve(placeholder: string, target: Target, vars: Record<string, string>): string {
  switch (placeholder) {
    case 'name':
      return target.name;
    case 'host':
      return target.destination.host;
    case 'user':
      return target.destination.user;
    case 'port':
      return String(target.destination.port ?? 22);
    case 'relay':
      return target.relay;
  }

  const [scope, key] = placeholder.split('.', 2);
  const source = scope === 'meta' ? target.metadata : vars;
  const value = Object.hasOwn(source, key) ? source[key] : undefined;
  if (value === undefined) {
    throw new TemplateError(
      `Placeholder "{{${placeholder}}}" has no value for target ${target.name}`,
      { target: target.name, placeholder }
    );
  }
  return String(value);
}
