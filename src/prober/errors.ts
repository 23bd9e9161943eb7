import axios from 'axios';
import type { ProbeFailure, ProbeFailureKind } from '../types/probe.js';

const FAILURE_PATTERNS: Array<{ kind: ProbeFailureKind; codes: string[]; patterns: RegExp[] }> = [
  {
    kind: 'timeout',
    // ERR_CANCELED and ABORT_ERR come from the per-request deadline signal
    codes: ['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ERR_CANCELED', 'ABORT_ERR'],
    patterns: [/timeout of \d+ms exceeded/i, /timed out/i, /aborted due to timeout/i],
  },
  {
    kind: 'dns',
    codes: ['ENOTFOUND', 'EAI_AGAIN', 'EAI_NODATA', 'EAI_NONAME'],
    patterns: [/getaddrinfo/i],
  },
  {
    kind: 'tls',
    codes: [
      'EPROTO',
      'CERT_HAS_EXPIRED',
      'CERT_NOT_YET_VALID',
      'DEPTH_ZERO_SELF_SIGNED_CERT',
      'SELF_SIGNED_CERT_IN_CHAIN',
      'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
      'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
      'ERR_TLS_CERT_ALTNAME_INVALID',
    ],
    patterns: [/\bssl\b/i, /\btls\b/i, /certificate/i, /handshake/i, /wrong version number/i],
  },
  {
    kind: 'connection',
    codes: ['ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE'],
    patterns: [
      /socket hang up/i,
      /Socks5 proxy rejected connection/i,
      /General SOCKS server failure/i,
      /Host unreachable/i,
      /Network is unreachable/i,
    ],
  },
];

function errorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) return null;

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  if ('cause' in error) {
    return errorCode(error.cause);
  }

  return null;
}

const DEADLINE_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

export function classifyNetworkError(error: unknown): ProbeFailure {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (error instanceof Error && DEADLINE_ERROR_NAMES.has(error.name)) {
    return { kind: 'timeout', message };
  }

  const code = axios.isAxiosError(error) ? (errorCode(error.cause) ?? error.code ?? null) : errorCode(error);

  if (code) {
    if (code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_')) {
      return { kind: 'tls', message };
    }
    for (const entry of FAILURE_PATTERNS) {
      if (entry.codes.includes(code)) {
        return { kind: entry.kind, message };
      }
    }
  }

  for (const entry of FAILURE_PATTERNS) {
    if (entry.patterns.some((pattern) => pattern.test(message))) {
      return { kind: entry.kind, message };
    }
  }

  return { kind: 'other', message };
}
