/**
 * Vendor cloud client
 *
 * Form-encoded POSTs with the vendor header set, a per-call timeout and
 * schema-checked responses. Error payloads are mapped onto the
 * CloudApiError family.
 */

import type { z } from 'zod';

import { describeError } from '@logging';
import { RequestTimeoutError, ServerError } from '$types';
import type {
  Appliance,
  ApplianceId,
  ApplianceRoster,
  FeederSetting,
  FountainSnapshot,
  JSONObject,
  LitterAction,
  LitterEventRecord,
  RelayCandidate,
  RelayLink
} from '$types';

import { applianceKindOf, dayStamp, expandPath, mapVendorError, toFountainSnapshot } from './helpers';
import {
  ConnectResultSchema,
  EnvelopeSchema,
  FountainDetailSchema,
  JsonObjectSchema,
  LitterRecordsSchema,
  PollResultSchema,
  RelayCandidatesSchema,
  RosterSchema
} from './schemas';
import type {
  CloudApi,
  CloudClientConfig,
  CloudClientOptions,
  ControlFrameRequest,
  FormFields,
  TokenProvider
} from './types';

export class PetCareCloudClient implements CloudApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(
    private readonly config: CloudClientConfig,
    private readonly tokenProvider: TokenProvider,
    options: CloudClientOptions = {}
  ) {
    this.baseUrl = config.REGION_URLS[config.REGION];
    this.timeoutMs = config.REQUEST_TIMEOUT_MS;
    this.clock = options.clock ?? function() { return new Date(); };
  }

  /**
   * Send one request, enforcing the timeout and forwarding caller aborts
   */
  private async send(path: string, body: string, token: string, signal?: AbortSignal): Promise<{ status: number; text: string }> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      if (signal?.aborted) {
        controller.abort();
      }
      const response = await fetch(this.baseUrl + path, {
        method: 'POST',
        headers: {
          ...this.config.VENDOR_HEADERS,
          'X-Session': token,
          'F-Session': token,
        },
        body: body,
        signal: controller.signal,
      });
      return { status: response.status, text: await response.text() };
    } catch (error) {
      if (timedOut) {
        throw new RequestTimeoutError(`Request to ${path} timed out after ${this.timeoutMs}ms`);
      }
      if (signal?.aborted) {
        throw signal.reason;
      }
      throw new ServerError(`Request to ${path} failed: ${describeError(error)}`);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * POST a form and return the envelope's `result`
   */
  private async post(path: string, fields: FormFields, signal?: AbortSignal): Promise<unknown> {
    const token = await this.tokenProvider.getToken();
    const body = new URLSearchParams();
    for (const [key, value] of Object.entries(fields)) {
      body.append(key, String(value));
    }

    const { status, text } = await this.send(path, body.toString(), token, signal);

    if (status < 200 || status > 299) {
      throw new ServerError(`HTTP ${status} from ${path}: ${text}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ServerError(`Could not read JSON from ${path}: ${describeError(error)}`);
    }

    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ServerError(`Unexpected response shape from ${path}`);
    }
    if (envelope.data.error) {
      throw mapVendorError(envelope.data.error.code, envelope.data.error.msg, this.config);
    }
    return envelope.data.result;
  }

  /**
   * POST and validate the result against a schema
   */
  private async postFor<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string, fields: FormFields, signal?: AbortSignal): Promise<T> {
    const result = await this.post(path, fields, signal);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new ServerError(`Unexpected result from ${path}: ${parsed.error.issues.map((i) => i.path.join('.') + ' ' + i.message).join('; ')}`);
    }
    return parsed.data;
  }

  private endpointFor(path: string, appliance: Appliance): string {
    return expandPath(path, appliance.model);
  }

  private isMiniFeeder(appliance: Appliance): boolean {
    return appliance.model === this.config.MINI_FEEDER_MODEL;
  }

  /**
   * The mini feeder has fixed paths; other feeders use the model path
   */
  private feederEndpoint(path: string, miniPath: string, appliance: Appliance): string {
    return this.isMiniFeeder(appliance) ? miniPath : this.endpointFor(path, appliance);
  }

  /**
   * Roster and relay
   */

  async getRoster(signal?: AbortSignal): Promise<ApplianceRoster> {
    const roster = await this.postFor(
      RosterSchema,
      this.config.ENDPOINTS.DEVICE_ROSTER,
      { day: dayStamp(this.clock()) },
      signal
    );

    const appliances: Appliance[] = [];
    for (const device of roster.devices ?? []) {
      const kind = applianceKindOf(device.type, this.config.APPLIANCE_MODELS);
      if (kind === null) {
        continue;
      }
      appliances.push({
        id: device.data.id,
        kind: kind,
        model: device.type.toLowerCase(),
        name: device.data.name ?? device.type,
        typeCode: device.data.typeCode ?? 0,
        pim: device.data.status?.pim ?? null,
      });
    }

    return { hasRelay: roster.hasRelay ?? false, appliances };
  }

  async listRelayCandidates(signal?: AbortSignal): Promise<RelayCandidate[]> {
    const candidates = await this.postFor(RelayCandidatesSchema, this.config.ENDPOINTS.BLE_DEVICES, {}, signal);
    return (candidates ?? []).map((candidate) => ({ id: candidate.id }));
  }

  async connect(link: RelayLink, signal?: AbortSignal): Promise<boolean> {
    const result = await this.postFor(ConnectResultSchema, this.config.ENDPOINTS.BLE_CONNECT, { ...link }, signal);
    return result.state === this.config.CONNECT_OK_STATE;
  }

  async poll(link: RelayLink, signal?: AbortSignal): Promise<boolean> {
    const result = await this.postFor(PollResultSchema, this.config.ENDPOINTS.BLE_POLL, { ...link }, signal);
    return result === this.config.POLL_OK_RESULT;
  }

  async cancel(link: RelayLink, signal?: AbortSignal): Promise<void> {
    await this.post(this.config.ENDPOINTS.BLE_CANCEL, { ...link }, signal);
  }

  async sendControlFrame(request: ControlFrameRequest, signal?: AbortSignal): Promise<void> {
    await this.post(
      this.config.ENDPOINTS.BLE_CONTROL,
      {
        bleId: request.bleId,
        cmd: request.cmd,
        data: request.data,
        mac: request.mac,
        type: request.type,
      },
      signal
    );
  }

  /**
   * Appliance detail
   */

  async getFountain(id: ApplianceId, signal?: AbortSignal): Promise<FountainSnapshot> {
    const raw = await this.postFor(JsonObjectSchema, this.config.ENDPOINTS.FOUNTAIN_DETAIL, { id }, signal);
    const parsed = FountainDetailSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ServerError(`Fountain ${id} detail is missing fields: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
    }
    return toFountainSnapshot(parsed.data, raw);
  }

  async getDeviceDetail(appliance: Appliance, signal?: AbortSignal): Promise<JSONObject> {
    return this.postFor(
      JsonObjectSchema,
      this.endpointFor(this.config.ENDPOINTS.DEVICE_DETAIL, appliance),
      { id: appliance.id },
      signal
    );
  }

  /**
   * Litter box
   */

  async controlLitterBox(appliance: Appliance, action: LitterAction, signal?: AbortSignal): Promise<void> {
    await this.post(
      this.endpointFor(this.config.ENDPOINTS.DEVICE_CONTROL, appliance),
      {
        id: appliance.id,
        kv: JSON.stringify({ [action.key]: action.value }),
        type: action.type,
      },
      signal
    );
  }

  async getLatestLitterEvent(appliance: Appliance, signal?: AbortSignal): Promise<LitterEventRecord | null> {
    const records = await this.postFor(
      LitterRecordsSchema,
      this.endpointFor(this.config.ENDPOINTS.DEVICE_RECORD, appliance),
      { day: dayStamp(this.clock()), deviceId: appliance.id },
      signal
    );

    const latest = records[records.length - 1];
    if (latest === undefined) {
      return null;
    }
    return {
      eventType: latest.enumEventType ?? '',
      result: latest.content?.result ?? null,
      timestamp: latest.timestamp ?? null,
    };
  }

  /**
   * Feeder
   */

  async manualFeed(appliance: Appliance, amountGrams: number, signal?: AbortSignal): Promise<void> {
    await this.post(
      this.feederEndpoint(this.config.ENDPOINTS.MANUAL_FEED, this.config.ENDPOINTS.MINI_MANUAL_FEED, appliance),
      {
        amount: amountGrams,
        day: dayStamp(this.clock()),
        deviceId: appliance.id,
        time: '-1',
      },
      signal
    );
  }

  async cancelManualFeed(appliance: Appliance, signal?: AbortSignal): Promise<void> {
    await this.post(
      this.endpointFor(this.config.ENDPOINTS.CANCEL_FEED, appliance),
      { day: dayStamp(this.clock()), deviceId: appliance.id },
      signal
    );
  }

  async resetDesiccant(appliance: Appliance, signal?: AbortSignal): Promise<void> {
    await this.post(
      this.feederEndpoint(this.config.ENDPOINTS.DESICCANT_RESET, this.config.ENDPOINTS.MINI_DESICCANT_RESET, appliance),
      { deviceId: appliance.id },
      signal
    );
  }

  async updateFeederSetting(appliance: Appliance, setting: FeederSetting, value: number, signal?: AbortSignal): Promise<void> {
    const mini = this.isMiniFeeder(appliance);
    const key = mini && this.config.MINI_NESTED_SETTINGS.includes(setting) ? 'settings.' + setting : setting;
    await this.post(
      this.feederEndpoint(this.config.ENDPOINTS.FEEDER_SETTINGS, this.config.ENDPOINTS.MINI_FEEDER_SETTINGS, appliance),
      { id: appliance.id, kv: JSON.stringify({ [key]: value }) },
      signal
    );
  }
}

/**
 * Create a cloud client
 * @param config - Region, endpoints, headers, timeout and error tables
 * @param tokenProvider - Session token source
 * @param options - Optional clock
 * @returns Cloud client
 */
export function createCloudClient(
  config: CloudClientConfig,
  tokenProvider: TokenProvider,
  options: CloudClientOptions = {}
): CloudApi {
  return new PetCareCloudClient(config, tokenProvider, options);
}
