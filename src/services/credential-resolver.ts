import { AppConfig } from "../config";
import {
  CredentialKeys,
  GeoQuery,
  ProviderId,
  ResolvedCredentials,
} from "../models/location";
import { CANDIDATES_BY_PRIORITY, isCredentialed } from "./upstream/candidates";
import { Rng } from "./rng";

/**
 * Decide which provider goes first and which key each credentialed
 * provider uses.
 *
 * A caller key wins over the process default for its own provider, and a
 * Baidu Map key wins over an AMap key for the first slot. Without any
 * caller key the starting provider is drawn at random from every provider
 * that can currently be queried, spreading load across upstreams.
 */
export function resolveCredentials(
  query: GeoQuery,
  defaultKeys: AppConfig["defaultKeys"],
  rng: Rng
): ResolvedCredentials {
  const caller = query.credentials ?? {};
  const keys: CredentialKeys = {};

  const baiduKey = caller["baidu-map"] || defaultKeys["baidu-map"];
  if (baiduKey) keys["baidu-map"] = baiduKey;
  const amapKey = caller.amap || defaultKeys.amap;
  if (amapKey) keys.amap = amapKey;

  if (caller["baidu-map"]) {
    return { primary: "baidu-map", keys };
  }
  if (caller.amap) {
    return { primary: "amap", keys };
  }

  const pool: ProviderId[] = CANDIDATES_BY_PRIORITY.map(
    (candidate) => candidate.providerId
  ).filter((providerId) => !isCredentialed(providerId) || Boolean(keys[providerId]));

  const primary = pool.length > 0 ? pool[rng.nextInt(pool.length)] : null;

  return { primary, keys };
}
