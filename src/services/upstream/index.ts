import { ProviderId } from "../../models/location";
import { AmapClient } from "./amap-client";
import { BaiduMapClient } from "./baidu-map-client";
import { BaiduOpendataClient } from "./baidu-opendata-client";
import { PconlineClient } from "./pconline-client";
import { UpstreamClient, UpstreamClientDeps } from "./upstream-client";

export type UpstreamClients = Readonly<Record<ProviderId, UpstreamClient>>;

/**
 * One client per provider, sharing transport, normalizer and timeout
 */
export function createUpstreamClients(deps: UpstreamClientDeps): UpstreamClients {
  return Object.freeze({
    "baidu-map": new BaiduMapClient(deps),
    amap: new AmapClient(deps),
    "baidu-opendata": new BaiduOpendataClient(deps),
    pconline: new PconlineClient(deps),
  });
}

export { UpstreamClient } from "./upstream-client";
export type { UpstreamClientDeps } from "./upstream-client";
