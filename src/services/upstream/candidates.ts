import {
  CredentialedProviderId,
  ProviderId,
  UpstreamCandidate,
} from "../../models/location";

export const BAIDU_MAP: UpstreamCandidate = {
  providerId: "baidu-map",
  requiresCredential: true,
  nativeFormat: "baidu",
  endpointTemplate: "https://api.map.baidu.com/location/ip?ip={ip}&coor={coor}&ak={key}",
};

export const AMAP: UpstreamCandidate = {
  providerId: "amap",
  requiresCredential: true,
  nativeFormat: "amap",
  endpointTemplate: "https://restapi.amap.com/v3/ip?ip={ip}&key={key}",
};

export const BAIDU_OPENDATA: UpstreamCandidate = {
  providerId: "baidu-opendata",
  requiresCredential: false,
  nativeFormat: "baidu",
  endpointTemplate:
    "https://opendata.baidu.com/api.php?query={ip}&co=&resource_id=6006&oe=utf8",
};

export const PCONLINE: UpstreamCandidate = {
  providerId: "pconline",
  requiresCredential: false,
  nativeFormat: "baidu",
  endpointTemplate: "http://whois.pconline.com.cn/ipJson.jsp?ip={ip}&json=true",
};

/**
 * Fixed fallback order: credentialed providers first, then keyless ones
 */
export const CANDIDATES_BY_PRIORITY: readonly UpstreamCandidate[] = [
  BAIDU_MAP,
  AMAP,
  BAIDU_OPENDATA,
  PCONLINE,
];

export function getCandidate(providerId: ProviderId): UpstreamCandidate {
  switch (providerId) {
    case "baidu-map":
      return BAIDU_MAP;
    case "amap":
      return AMAP;
    case "baidu-opendata":
      return BAIDU_OPENDATA;
    case "pconline":
      return PCONLINE;
  }
}

export function isCredentialed(
  providerId: ProviderId
): providerId is CredentialedProviderId {
  return providerId === "baidu-map" || providerId === "amap";
}

/**
 * Base URL of a candidate, i.e. the template without its query string
 */
export function endpointUrl(candidate: UpstreamCandidate): string {
  return candidate.endpointTemplate.split("?")[0];
}
