/**
 * Appliance descriptors shared by the cloud client and the orchestrator
 */

import type { ApplianceId, JSONObject } from './common';

/**
 * Appliance families handled by the controller
 */
export const APPLIANCE_KINDS = {
  FOUNTAIN: 'fountain',
  FEEDER: 'feeder',
  LITTER_BOX: 'litterBox',
  PURIFIER: 'purifier'
} as const;

export type ApplianceKind = typeof APPLIANCE_KINDS[keyof typeof APPLIANCE_KINDS];

/**
 * One appliance as listed in the account roster
 */
export interface Appliance {
  id: ApplianceId;
  kind: ApplianceKind;
  /** Lower-cased vendor model string, used in endpoint paths (e.g. "w5", "t4", "d4") */
  model: string;
  name: string;
  /** Vendor numeric type code */
  typeCode: number;
  /** Relay power indicator (1 = powered, idle, main; 2 = on battery) when reported */
  pim: number | null;
}

/**
 * Roster snapshot: every appliance plus the account-level relay flag
 */
export interface ApplianceRoster {
  hasRelay: boolean;
  appliances: Appliance[];
}

/**
 * Fountain settings echoed back in every settings-class frame
 */
export interface FountainSettings {
  smartWorkingTime: number;
  smartSleepTime: number;
  lampRingSwitch: number;
  lampRingBrightness: number;
  /** Minutes since midnight, packed as a 16-bit big-endian pair */
  lightUpTime: number;
  lightOutTime: number;
  noDisturbingSwitch: number;
  noDisturbingStart: number;
  noDisturbingEnd: number;
}

/**
 * Fountain state as fetched from the cloud
 */
export interface FountainSnapshot {
  id: ApplianceId;
  name: string;
  mac: string;
  typeCode: number;
  /** 1 = running, 0 = paused */
  powerStatus: number;
  /** 1 = normal, 2 = smart */
  mode: number;
  settings: FountainSettings;
  raw: JSONObject;
}

/**
 * Most recent litter box event, as far as the dual-stage resume needs it
 */
export interface LitterEventRecord {
  eventType: string;
  result: number | null;
  timestamp: number | null;
}

/**
 * One entry of the relay candidate list
 */
export interface RelayCandidate {
  id: ApplianceId;
}

/**
 * Identifiers every relay call carries
 */
export interface RelayLink {
  /** Fountain id */
  bleId: ApplianceId;
  mac: string;
  /** Relay type code */
  type: number;
}

/**
 * Litter box control triple, posted as `kv = {key: value}` with `type`
 */
export interface LitterAction {
  key: string;
  type: string;
  value: number;
}

/**
 * Feeder setting keys, posted as `kv = {key: value}`
 */
export const FEEDER_SETTINGS = {
  CHILD_LOCK: 'manualLock',
  DISPENSE_TONE: 'feedSound',
  DO_NOT_DISTURB: 'disturbMode',
  INDICATOR_LIGHT: 'lightMode',
  SELECTED_SOUND: 'selectedSound',
  SHORTAGE_ALARM: 'foodWarn',
  SOUND_ENABLE: 'soundEnable',
  SURPLUS: 'surplus',
  SURPLUS_CONTROL: 'surplusControl',
  SYSTEM_SOUND: 'systemSoundEnable',
  VOLUME: 'volume'
} as const;

export type FeederSetting = typeof FEEDER_SETTINGS[keyof typeof FEEDER_SETTINGS];
