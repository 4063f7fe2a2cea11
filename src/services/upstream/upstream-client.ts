import {
  FailureReason,
  GeoQuery,
  ProviderId,
  UpstreamCandidate,
  UpstreamFailure,
  UpstreamOutcome,
} from "../../models/location";
import {
  FetchJson,
  FetchOptions,
  UpstreamParseError,
  UpstreamTransportError,
} from "../http-fetcher";
import { ResponseNormalizer } from "../response-normalizer";
import { endpointUrl } from "./candidates";

export interface UpstreamClientDeps {
  fetchJson: FetchJson;
  normalizer: ResponseNormalizer;
  timeoutMs: number;
}

/**
 * A provider-level rejection found in an otherwise well-formed body
 */
export interface Rejection {
  reason: FailureReason;
  detail: string;
}

/**
 * One geolocation lookup against one provider.
 *
 * `invoke` never throws: transport problems, provider error codes, bad
 * bodies and bodies without province/city all come back as a typed
 * failure. A success is only returned once the payload normalized to a
 * complete location.
 */
export abstract class UpstreamClient {
  protected readonly fetchJson: FetchJson;
  protected readonly normalizer: ResponseNormalizer;
  protected readonly timeoutMs: number;

  constructor(readonly candidate: UpstreamCandidate, deps: UpstreamClientDeps) {
    this.fetchJson = deps.fetchJson;
    this.normalizer = deps.normalizer;
    this.timeoutMs = deps.timeoutMs;
  }

  get providerId(): ProviderId {
    return this.candidate.providerId;
  }

  async invoke(query: GeoQuery, key?: string): Promise<UpstreamOutcome> {
    if (this.candidate.requiresCredential && !key) {
      return this.fail("credential-missing", "no key available");
    }

    let payload: unknown;
    try {
      payload = await this.fetchJson(
        endpointUrl(this.candidate),
        this.buildParams(query, key),
        this.fetchOptions()
      );
    } catch (error) {
      return this.failFromError(error);
    }

    const rejection = this.checkRejection(payload);
    if (rejection) {
      return this.fail(rejection.reason, rejection.detail);
    }

    const normalized = this.normalizer.normalize(payload, this.providerId);
    if (!normalized.ok) {
      return this.fail(normalized.reason, normalized.detail);
    }

    return {
      ok: true,
      providerId: this.providerId,
      rawPayload: payload,
      location: normalized.location,
    };
  }

  protected fetchOptions(): FetchOptions {
    return { timeoutMs: this.timeoutMs };
  }

  protected fail(reason: FailureReason, detail?: string): UpstreamFailure {
    return { ok: false, providerId: this.providerId, reason, detail };
  }

  private failFromError(error: unknown): UpstreamFailure {
    if (error instanceof UpstreamTransportError) {
      return this.fail("timeout", error.message);
    }
    if (error instanceof UpstreamParseError) {
      return this.fail("malformed-response", error.message);
    }
    const message = error instanceof Error ? error.message : String(error);
    return this.fail("malformed-response", message);
  }

  /**
   * Query string for this provider's endpoint
   */
  protected abstract buildParams(query: GeoQuery, key?: string): Record<string, string>;

  /**
   * Map the provider's own error codes; null when the body is not an error
   */
  protected abstract checkRejection(payload: unknown): Rejection | null;
}
