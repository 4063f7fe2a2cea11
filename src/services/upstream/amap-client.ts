import { GeoQuery } from "../../models/location";
import { amapStatusSchema } from "../payload-schemas";
import { AMAP } from "./candidates";
import { Rejection, UpstreamClient, UpstreamClientDeps } from "./upstream-client";

// INVALID_USER_KEY through INSUFFICIENT_PRIVILEGES / USER_KEY_RECYCLED,
// plus the per-user daily and concurrency limits
const CREDENTIAL_INFOCODES = new Set([
  "10001", "10002", "10003", "10004", "10005", "10006", "10007", "10008",
  "10009", "10010", "10011", "10012", "10013", "10044", "10045",
]);

/**
 * AMap v3/ip, keyed by `key`
 */
export class AmapClient extends UpstreamClient {
  constructor(deps: UpstreamClientDeps) {
    super(AMAP, deps);
  }

  protected buildParams(query: GeoQuery, key?: string): Record<string, string> {
    return { ip: query.ip, key: key || "" };
  }

  protected checkRejection(payload: unknown): Rejection | null {
    const result = amapStatusSchema.safeParse(payload);
    if (!result.success) {
      return { reason: "malformed-response", detail: "missing status" };
    }

    const { status, info, infocode } = result.data;
    if (status === "1") return null;

    const detail = `infocode ${infocode || "?"}${info ? `: ${info}` : ""}`;
    return infocode && CREDENTIAL_INFOCODES.has(infocode)
      ? { reason: "credential-invalid", detail }
      : { reason: "malformed-response", detail };
  }
}
