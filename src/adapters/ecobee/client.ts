import { z } from "zod";
import { AuthError, EcobeeApiError, MalformedResponseError, errorMessage } from "../../errors.js";
import { logger } from "../../utils/logger.js";
import { fetchWithTimeout } from "../../utils/fetchWithTimeout.js";

const TOKEN_EXPIRED_STATUS = 14;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export interface Selection {
  selectionType: "registered" | "thermostats";
  selectionMatch: string;
  includeAlerts?: boolean;
  includeEvents?: boolean;
  includeProgram?: boolean;
  includeRuntime?: boolean;
  includeExtendedRuntime?: boolean;
  includeSettings?: boolean;
  includeSensors?: boolean;
  includeWeather?: boolean;
  includeEquipmentStatus?: boolean;
}

const StatusSchema = z.object({
  code: z.number().int(),
  message: z.string().default("")
});

const ThermostatSchema = z
  .object({
    identifier: z.string().min(1),
    name: z.string().default(""),
    modelNumber: z.string().default(""),
    brand: z.string().default("")
  })
  .passthrough();

export const GetThermostatsResponseSchema = z.object({
  thermostatList: z.array(ThermostatSchema).default([]),
  status: StatusSchema
});

export const ThermostatSummaryResponseSchema = z.object({
  thermostatCount: z.number().int().min(0),
  revisionList: z.array(z.string()).default([]),
  statusList: z.array(z.string()).default([]),
  status: StatusSchema
});

export const RuntimeReportResponseSchema = z.object({
  startDate: z.string(),
  startInterval: z.number().int().min(0),
  endDate: z.string(),
  endInterval: z.number().int().min(0),
  columns: z.string(),
  reportList: z
    .array(
      z.object({
        thermostatIdentifier: z.string().min(1),
        rowCount: z.number().int().min(0).optional(),
        rowList: z.array(z.string()).default([])
      })
    )
    .default([]),
  status: StatusSchema
});

export type ThermostatRecord = z.infer<typeof ThermostatSchema>;
export type ThermostatSummaryResponse = z.infer<typeof ThermostatSummaryResponseSchema>;
export type RuntimeReportResponse = z.infer<typeof RuntimeReportResponseSchema>;

export interface RuntimeReportRequest {
  selection: Selection;
  startDate: string;
  endDate: string;
  columns: string;
  includeSensors?: boolean;
}

export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
  invalidate(): void;
}

export interface EcobeeClientConfig {
  baseUrl: string;
  timeoutMs: number;
  tokens: AccessTokenSource;
}

export class EcobeeClient {
  constructor(private readonly cfg: EcobeeClientConfig) {}

  async getThermostats(selection: Selection): Promise<ThermostatRecord[]> {
    const body = await this.get("/1/thermostat", { selection }, GetThermostatsResponseSchema);
    return body.thermostatList;
  }

  async getThermostatSummary(selection: Selection): Promise<ThermostatSummaryResponse> {
    return this.get("/1/thermostatSummary", { selection }, ThermostatSummaryResponseSchema);
  }

  async getRuntimeReport(request: RuntimeReportRequest): Promise<RuntimeReportResponse> {
    return this.get("/1/runtimeReport", request, RuntimeReportResponseSchema);
  }

  private async get<T extends { status: { code: number; message: string } }>(
    endpoint: string,
    request: object,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    isRetryAfterAuth = false
  ): Promise<T> {
    const url = new URL(endpoint, this.cfg.baseUrl);
    url.searchParams.set("json", JSON.stringify(request));

    const token = await this.cfg.tokens.getAccessToken();
    logger.debug({ endpoint, request }, "ecobee request");

    let resp: Response;
    try {
      resp = await fetchWithTimeout(url.toString(), {
        timeoutMs: this.cfg.timeoutMs,
        headers: {
          "content-type": "application/json;charset=UTF-8",
          authorization: `Bearer ${token}`
        }
      });
    } catch (err) {
      throw new EcobeeApiError(`ecobee ${endpoint} request failed: ${errorMessage(err)}`, undefined, { cause: err });
    }

    const text = await resp.text();
    let json: unknown;
    try {
      json = text ? JSON.parse(text) : {};
    } catch (err) {
      if (!resp.ok) {
        throw new EcobeeApiError(`ecobee ${endpoint} error: ${resp.status} ${resp.statusText}`, resp.status);
      }
      throw new MalformedResponseError(`ecobee ${endpoint} returned non-JSON body`, { cause: err });
    }

    const statusCode = StatusSchema.safeParse(isObject(json) ? json.status : undefined);
    const tokenExpired = statusCode.success && statusCode.data.code === TOKEN_EXPIRED_STATUS;

    if (resp.status === 401 || resp.status === 403 || tokenExpired) {
      if (!isRetryAfterAuth) {
        logger.info({ endpoint, httpStatus: resp.status }, "ecobee rejected access token; refreshing");
        this.cfg.tokens.invalidate();
        return this.get(endpoint, request, schema, true);
      }
      throw new AuthError(`ecobee ${endpoint} unauthorized: ${resp.status} ${text}`);
    }

    if (!resp.ok) {
      throw new EcobeeApiError(`ecobee ${endpoint} error: ${resp.status} ${resp.statusText} ${text}`, resp.status);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new MalformedResponseError(`ecobee ${endpoint} response failed validation: ${parsed.error.message}`);
    }
    if (parsed.data.status.code !== 0) {
      throw new MalformedResponseError(
        `ecobee ${endpoint} api error ${parsed.data.status.code}: ${parsed.data.status.message}`
      );
    }
    return parsed.data;
  }
}
