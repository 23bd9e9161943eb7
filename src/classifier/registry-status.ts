import type { RegistryRecord } from '../types/registry.js';
import type { Classification } from '../types/record.js';

// RDAP statuses of a registration past its expiry and on its way back to the pool
const LAPSED_STATUSES = ['redemption period', 'pending delete'];

export function resolveRegistryStatus(record: RegistryRecord, scanTime: Date): Classification {
  if (!record.found) {
    if (record.error) {
      return {
        status: 'available',
        confidence: 'low',
        reason: `Registry lookup failed: ${record.error}`,
        salePlatform: null,
      };
    }
    return {
      status: 'available',
      confidence: 'high',
      reason: 'No registration record',
      salePlatform: null,
    };
  }

  const scanDay = scanTime.toISOString().substring(0, 10);
  if (record.expiresOn && record.expiresOn < scanDay) {
    return {
      status: 'expired',
      confidence: 'high',
      reason: `Registration expired on ${record.expiresOn}`,
      salePlatform: null,
    };
  }

  const lapsed = record.statuses.find((status) => LAPSED_STATUSES.includes(status.toLowerCase()));
  if (lapsed) {
    return {
      status: 'expired',
      confidence: 'medium',
      reason: `Registry status "${lapsed}"`,
      salePlatform: null,
    };
  }

  return {
    status: 'parked',
    confidence: 'medium',
    reason: 'Registered but serving no web content',
    salePlatform: null,
  };
}
