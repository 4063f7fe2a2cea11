import { GeoQuery } from "../../models/location";
import { baiduOpendataStatusSchema } from "../payload-schemas";
import { BAIDU_OPENDATA } from "./candidates";
import { Rejection, UpstreamClient, UpstreamClientDeps } from "./upstream-client";

/**
 * Baidu open data IP resource (id 6006); no key
 */
export class BaiduOpendataClient extends UpstreamClient {
  constructor(deps: UpstreamClientDeps) {
    super(BAIDU_OPENDATA, deps);
  }

  protected buildParams(query: GeoQuery): Record<string, string> {
    return { query: query.ip, co: "", resource_id: "6006", oe: "utf8" };
  }

  protected checkRejection(payload: unknown): Rejection | null {
    const result = baiduOpendataStatusSchema.safeParse(payload);
    if (!result.success) {
      return { reason: "malformed-response", detail: "missing status" };
    }
    if (result.data.status !== "0") {
      return { reason: "malformed-response", detail: `status ${result.data.status}` };
    }
    if (!result.data.data || result.data.data.length === 0) {
      return { reason: "malformed-response", detail: "empty data" };
    }
    return null;
  }
}
