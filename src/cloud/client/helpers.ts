/**
 * Cloud client helpers
 */

import { APPLIANCE_KINDS, AuthError, BluetoothError, CloudApiError, ServerError } from '$types';
import type { ApplianceKind, FountainSnapshot, JSONObject, PetCareAppConstants } from '$types';

import type { FountainDetail } from './schemas';

/**
 * Map a vendor error payload to the error family it belongs to
 *
 * @param code - Vendor error code
 * @param msg - Vendor message, when present
 * @param tables - Error-code tables
 * @returns Error to throw
 */
export function mapVendorError(
  code: number,
  msg: string | undefined,
  tables: Pick<PetCareAppConstants, 'AUTH_ERROR_CODES' | 'SERVER_ERROR_CODES' | 'BLUETOOTH_ERROR_CODES'>
): CloudApiError {
  const message = 'Vendor error ' + code + ': ' + (msg ?? 'no message');

  if (tables.AUTH_ERROR_CODES.includes(code)) {
    return new AuthError(message, code);
  }
  if (tables.SERVER_ERROR_CODES.includes(code)) {
    return new ServerError(message, code);
  }
  if (tables.BLUETOOTH_ERROR_CODES.includes(code)) {
    return new BluetoothError(message, code);
  }
  return new CloudApiError(message, code);
}

/**
 * Fill the `{model}` placeholder of an endpoint path
 * @param path - Endpoint path
 * @param model - Lower-cased model
 * @returns Path for that model
 */
export function expandPath(path: string, model: string): string {
  return path.replace('{model}', model);
}

/**
 * Date in the vendor's `day` format
 * @param date - Local date
 * @returns YYYYMMDD
 */
export function dayStamp(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return String(date.getFullYear()) + month + day;
}

/**
 * Appliance family of a roster model
 * @param type - Roster type string (any case)
 * @param models - Model lists per family
 * @returns Family, or null for models the controller does not handle
 */
export function applianceKindOf(
  type: string,
  models: PetCareAppConstants['APPLIANCE_MODELS']
): ApplianceKind | null {
  const model = type.toLowerCase();
  for (const kind of Object.values(APPLIANCE_KINDS)) {
    if (models[kind].includes(model)) {
      return kind;
    }
  }
  return null;
}

/**
 * Relay type code for a fountain session
 *
 * A configured code wins. Otherwise the relay's and the fountain's type
 * codes are concatenated as decimal digits.
 *
 * @param relayTypeCode - Type code of the relay appliance
 * @param fountainTypeCode - Type code of the fountain
 * @param override - Configured code, or null
 * @returns Relay type code
 *
 * @example
 * ```typescript
 * deriveRelayTypeCode(1, 4, null); // 14
 * ```
 */
export function deriveRelayTypeCode(relayTypeCode: number, fountainTypeCode: number, override: number | null): number {
  if (override !== null) {
    return override;
  }
  return Number(String(relayTypeCode) + String(fountainTypeCode));
}

function firstRange(ranges: number[][] | undefined): [number, number] {
  const range = ranges?.[0];
  return [range?.[0] ?? 0, range?.[1] ?? 0];
}

/**
 * Convert a validated fountain detail into a snapshot
 * @param detail - Parsed detail
 * @param raw - Unmodified result object
 * @returns Fountain snapshot
 */
export function toFountainSnapshot(detail: FountainDetail, raw: JSONObject): FountainSnapshot {
  const [lightUpTime, lightOutTime] = firstRange(detail.settings.lightMultiRange);
  const [noDisturbingStart, noDisturbingEnd] = firstRange(detail.settings.disturbMultiRange);

  return {
    id: detail.id,
    name: detail.name,
    mac: detail.mac,
    typeCode: detail.typeCode,
    powerStatus: detail.powerStatus,
    mode: detail.mode,
    settings: {
      smartWorkingTime: detail.settings.smartWorkingTime,
      smartSleepTime: detail.settings.smartSleepTime,
      lampRingSwitch: detail.settings.lampRingSwitch,
      lampRingBrightness: detail.settings.lampRingBrightness,
      lightUpTime: lightUpTime,
      lightOutTime: lightOutTime,
      noDisturbingSwitch: detail.settings.noDisturbingSwitch,
      noDisturbingStart: noDisturbingStart,
      noDisturbingEnd: noDisturbingEnd
    },
    raw: raw
  };
}
