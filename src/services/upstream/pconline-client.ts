import { GeoQuery } from "../../models/location";
import { FetchOptions } from "../http-fetcher";
import { pconlineStatusSchema } from "../payload-schemas";
import { PCONLINE } from "./candidates";
import { Rejection, UpstreamClient, UpstreamClientDeps } from "./upstream-client";

/**
 * PConline whois JSON; no key, GBK-encoded body
 */
export class PconlineClient extends UpstreamClient {
  constructor(deps: UpstreamClientDeps) {
    super(PCONLINE, deps);
  }

  protected buildParams(query: GeoQuery): Record<string, string> {
    return { ip: query.ip, json: "true" };
  }

  protected fetchOptions(): FetchOptions {
    return { timeoutMs: this.timeoutMs, encoding: "gbk" };
  }

  protected checkRejection(payload: unknown): Rejection | null {
    const result = pconlineStatusSchema.safeParse(payload);
    if (!result.success) {
      return { reason: "malformed-response", detail: "not an object" };
    }
    return result.data.err
      ? { reason: "malformed-response", detail: `err ${result.data.err}` }
      : null;
  }
}
