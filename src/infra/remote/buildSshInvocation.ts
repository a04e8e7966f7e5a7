import os from 'node:os';
import { ExecutionError } from '../../domain/errors.js';
import type { Target } from '../../domain/entities/Target.js';

export interface SshOptions {
  sshBinary: string;
  sshpassBinary: string;
  connectTimeoutSeconds: number;
  serverAliveIntervalSeconds?: number;
  serverAliveCountMax?: number;
}

export interface SshInvocation {
  file: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

/**
 * Builds the ssh command line that reaches the target through its relay.
 * Password credentials go through `sshpass -e`; the secret only travels in the
 * child's environment, never on the command line.
 */
export function buildSshInvocation(
  target: Target,
  command: string,
  options: SshOptions,
  baseEnv: NodeJS.ProcessEnv = process.env
): SshInvocation {
  const args = [
    '-o',
    'StrictHostKeyChecking=no',
    '-o',
    'UserKnownHostsFile=/dev/null',
    '-o',
    'LogLevel=ERROR',
    '-o',
    `ConnectTimeout=${options.connectTimeoutSeconds}`,
    '-o',
    `ServerAliveInterval=${options.serverAliveIntervalSeconds ?? 30}`,
    '-o',
    `ServerAliveCountMax=${options.serverAliveCountMax ?? 4}`,
  ];

  if (target.destination.port !== null) {
    args.push('-p', String(target.destination.port));
  }

  const credential = target.credential;
  switch (credential.type) {
    case 'agent':
      args.push('-o', 'BatchMode=yes');
      break;
    case 'key':
      args.push('-o', 'BatchMode=yes', '-i', expandHome(credential.path));
      break;
    case 'password':
      args.push('-o', 'NumberOfPasswordPrompts=1');
      break;
  }

  args.push('-J', target.relay, `${target.destination.user}@${target.destination.host}`, command);

  if (credential.type !== 'password') {
    return { file: options.sshBinary, args, env: { ...baseEnv } };
  }

  const secret = 'secret' in credential ? credential.secret : baseEnv[credential.env];
  if (!secret) {
    const source = 'env' in credential ? `environment variable ${credential.env}` : 'inventory';
    throw new ExecutionError(`No password available for ${target.name} (${source})`, 'launch_failed');
  }

  return {
    file: options.sshpassBinary,
    args: ['-e', options.sshBinary, ...args],
    env: { ...baseEnv, SSHPASS: secret },
  };
}

function expandHome(filePath: string): string {
  return filePath.startsWith('~/') ? `${os.homedir()}${filePath.slice(1)}` : filePath;
}
