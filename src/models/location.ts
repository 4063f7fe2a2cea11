/**
 * Upstream geolocation providers
 */
export type ProviderId = "baidu-map" | "amap" | "baidu-opendata" | "pconline";

/**
 * Providers that only answer when given an access key
 */
export type CredentialedProviderId = "baidu-map" | "amap";

/**
 * Response schemas the service can emit. `baidu` mirrors the Baidu Map
 * location/ip body, `amap` mirrors the AMap v3/ip body.
 */
export type OutputFormat = "baidu" | "amap";

/**
 * What an endpoint asks for: a fixed format, or whatever the answering
 * provider speaks natively.
 */
export type FormatSelection = OutputFormat | "native";

export type CredentialKeys = Partial<Record<CredentialedProviderId, string>>;

/**
 * A single lookup request, already validated. `credentials` holds only the
 * keys the caller sent.
 */
export interface GeoQuery {
  readonly ip: string;
  readonly coordinateSystem?: string;
  readonly credentials?: Readonly<CredentialKeys>;
}

export interface ResolvedCredentials {
  primary: ProviderId | null;
  keys: CredentialKeys;
}

export interface UpstreamCandidate {
  providerId: ProviderId;
  requiresCredential: boolean;
  nativeFormat: OutputFormat;
  endpointTemplate: string;
}

export type FailureReason =
  | "credential-invalid"
  | "credential-missing"
  | "timeout"
  | "malformed-response"
  | "incomplete-location";

/**
 * Only built once the payload normalized to a complete location
 */
export interface UpstreamSuccess {
  ok: true;
  providerId: ProviderId;
  rawPayload: unknown;
  location: NormalizedLocation;
}

export interface UpstreamFailure {
  ok: false;
  providerId: ProviderId;
  reason: FailureReason;
  detail?: string;
}

export type UpstreamOutcome = UpstreamSuccess | UpstreamFailure;

/**
 * Provider-independent location. Coordinates stay as the strings the
 * provider sent; they may be in a projected coordinate system.
 */
export interface NormalizedLocation {
  countryCode: string;
  province: string;
  city: string;
  district?: string;
  adcode?: string;
  cityCode?: number;
  longitude?: string;
  latitude?: string;
  rectangle?: string;
  sourceProviderId: ProviderId;
}

export interface BaiduAddressDetail {
  adcode: string;
  city: string;
  city_code: number;
  district: string;
  province: string;
  street: string;
  street_number: string;
}

export interface BaiduSuccessBody {
  address: string;
  content: {
    address: string;
    address_detail: BaiduAddressDetail;
    point?: { x: string; y: string };
  };
  status: 0;
}

export interface BaiduFailureBody {
  status: number;
  message: string;
}

export interface AmapBody {
  status: "0" | "1";
  info: string;
  infocode: string;
  province: string;
  city: string;
  adcode: string;
  rectangle: string;
}

export type ResponseEnvelope =
  | {
      format: "baidu";
      ok: true;
      httpStatus: 200;
      body: BaiduSuccessBody;
    }
  | {
      format: "baidu";
      ok: false;
      httpStatus: 503;
      body: BaiduFailureBody;
    }
  | {
      format: "amap";
      ok: boolean;
      httpStatus: 200;
      body: AmapBody;
    };
