import { GeoQuery } from "../../models/location";
import { baiduMapStatusSchema } from "../payload-schemas";
import { BAIDU_MAP } from "./candidates";
import { Rejection, UpstreamClient, UpstreamClientDeps } from "./upstream-client";

export const DEFAULT_COORDINATE_SYSTEM = "bd09ll";

// AK missing/invalid, IP/SN/referer checks, permission, disabled service,
// unknown user or service, quota and concurrency limits
const CREDENTIAL_STATUS_CODES = new Set([
  101, 102, 200, 210, 211, 220, 230, 240, 250, 251, 252, 260, 261, 301, 302,
  401, 402,
]);

/**
 * Baidu Map location/ip, keyed by `ak`
 */
export class BaiduMapClient extends UpstreamClient {
  constructor(deps: UpstreamClientDeps) {
    super(BAIDU_MAP, deps);
  }

  protected buildParams(query: GeoQuery, key?: string): Record<string, string> {
    return {
      ip: query.ip,
      coor: query.coordinateSystem || DEFAULT_COORDINATE_SYSTEM,
      ak: key || "",
    };
  }

  protected checkRejection(payload: unknown): Rejection | null {
    const result = baiduMapStatusSchema.safeParse(payload);
    if (!result.success) {
      return { reason: "malformed-response", detail: "missing status" };
    }

    const { status, message } = result.data;
    if (status === 0) return null;

    const detail = `status ${status}${message ? `: ${message}` : ""}`;
    return CREDENTIAL_STATUS_CODES.has(status)
      ? { reason: "credential-invalid", detail }
      : { reason: "malformed-response", detail };
  }
}
