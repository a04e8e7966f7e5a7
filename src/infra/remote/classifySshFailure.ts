import type { ExecutionErrorKind } from '../../domain/errors.js';

/** ssh exits with 255 when the failure is its own rather than the remote command's */
export const SSH_FAILURE_EXIT = 255;

const AUTH_PATTERNS = [
  /permission denied/i,
  /too many authentication failures/i,
  /authentication failed/i,
  /no supported authentication methods/i,
];

const UNREACHABLE_PATTERNS = [
  /could not resolve hostname/i,
  /name or service not known/i,
  /connection refused/i,
  /no route to host/i,
  /network is unreachable/i,
  /connection timed out/i,
  /operation timed out/i,
  /kex_exchange_identification/i,
  /ssh_exchange_identification/i,
  /stdio forwarding failed/i,
  /channel \d+: open failed/i,
];

const DROPPED_PATTERNS = [
  /connection to .* closed by remote host/i,
  /connection closed by/i,
  /connection reset/i,
  /broken pipe/i,
  /timeout, server .* not responding/i,
  /client_loop: send disconnect/i,
];

/**
 * Maps a failed attempt's exit status and stderr to a failure kind
 */
export function classifySshFailure(params: {
  exitStatus: number;
  stderr: string;
  producedOutput: boolean;
}): Exclude<ExecutionErrorKind, 'timeout' | 'launch_failed'> {
  if (params.exitStatus !== SSH_FAILURE_EXIT) {
    return 'nonzero_exit';
  }
  if (AUTH_PATTERNS.some((pattern) => pattern.test(params.stderr))) {
    return 'auth_rejected';
  }
  if (UNREACHABLE_PATTERNS.some((pattern) => pattern.test(params.stderr))) {
    return 'relay_unreachable';
  }
  if (DROPPED_PATTERNS.some((pattern) => pattern.test(params.stderr))) {
    return 'connection_dropped';
  }
  return params.producedOutput ? 'connection_dropped' : 'relay_unreachable';
}
