import { isFriendlyType } from '../cot/taxonomy';
import type { CotEvent } from '../cot/types';
import type { DataSharingPolicy, DataType, DataTypeSelector } from '../schemas/federation-schemas';

export const DEFAULT_DATA_SHARING_POLICY: DataSharingPolicy = {
  receiveTypes: ['all'],
  sendTypes: ['friendly'],
  autoShare: true,
  blueTeamOnly: true,
  bidirectional: true,
};

const DATA_TYPE_RULES: ReadonlyArray<readonly [prefix: string, dataType: DataType]> = [
  ['a-f-', 'friendly'],
  ['a-h-', 'hostile'],
  ['a-u-', 'unknown'],
  ['a-n-', 'neutral'],
  ['b-m-p-c', 'route'],
  ['b-r-f-h-c', 'casevac'],
  ['u-d-f', 'geofence'],
  ['u-d-c-c', 'target'],
];

/**
 * Federation data class of a CoT type code. Prefix rules are checked in
 * order; remaining `b-` codes are sensor data and anything else is unknown.
 */
export function getDataType(type: string): DataType {
  for (const [prefix, dataType] of DATA_TYPE_RULES) {
    if (type.startsWith(prefix)) {
      return dataType;
    }
  }
  return type.startsWith('b-') ? 'sensor' : 'unknown';
}

function selects(selectors: readonly DataTypeSelector[], dataType: DataType): boolean {
  return selectors.includes('all') || selectors.includes(dataType);
}

export function shouldReceive(policy: DataSharingPolicy, event: CotEvent): boolean {
  return selects(policy.receiveTypes, getDataType(event.type));
}

/**
 * Whether `event` may be sent to a peer governed by `policy`. Receive-only
 * peers (`bidirectional: false`) never get anything; with `blueTeamOnly`
 * only friendly entities pass.
 */
export function shouldSend(policy: DataSharingPolicy, event: CotEvent): boolean {
  if (!policy.bidirectional) {
    return false;
  }
  if (policy.blueTeamOnly && !isFriendlyType(event.type)) {
    return false;
  }
  return selects(policy.sendTypes, getDataType(event.type));
}

export function mergePolicy(overrides: Partial<DataSharingPolicy> = {}, base: DataSharingPolicy = DEFAULT_DATA_SHARING_POLICY): DataSharingPolicy {
  return {
    receiveTypes: [...(overrides.receiveTypes ?? base.receiveTypes)],
    sendTypes: [...(overrides.sendTypes ?? base.sendTypes)],
    autoShare: overrides.autoShare ?? base.autoShare,
    blueTeamOnly: overrides.blueTeamOnly ?? base.blueTeamOnly,
    bidirectional: overrides.bidirectional ?? base.bidirectional,
  };
}
