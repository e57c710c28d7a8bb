export { PetCareCloudClient, createCloudClient } from './client';
export { mapVendorError, expandPath, dayStamp, applianceKindOf, deriveRelayTypeCode, toFountainSnapshot } from './helpers';
export type {
  TokenProvider,
  CloudClientConfig,
  CloudClientOptions,
  ControlFrameRequest,
  RelayTransport,
  CloudApi,
  FormFields
} from './types';
