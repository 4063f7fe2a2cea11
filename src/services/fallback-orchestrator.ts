import {
  FailureReason,
  FormatSelection,
  GeoQuery,
  NormalizedLocation,
  OutputFormat,
  ProviderId,
  ResolvedCredentials,
  ResponseEnvelope,
  UpstreamCandidate,
} from "../models/location";
import { buildFailureEnvelope, buildSuccessEnvelope } from "./envelope-builder";
import { logger } from "./logger";
import { CANDIDATES_BY_PRIORITY, getCandidate, isCredentialed } from "./upstream/candidates";
import { UpstreamClients } from "./upstream";

export interface AttemptRecord {
  providerId: ProviderId;
  reason: FailureReason;
  detail?: string;
}

export interface ResolutionResult {
  envelope: ResponseEnvelope;
  location: NormalizedLocation | null;
  /** Failed attempts in the order they happened, for diagnostics */
  attempts: AttemptRecord[];
}

/**
 * Primary first, then everything else in fixed priority order
 */
export function planCandidates(resolved: ResolvedCredentials): UpstreamCandidate[] {
  if (!resolved.primary) return [...CANDIDATES_BY_PRIORITY];

  return [
    getCandidate(resolved.primary),
    ...CANDIDATES_BY_PRIORITY.filter(
      (candidate) => candidate.providerId !== resolved.primary
    ),
  ];
}

/**
 * Walks the candidate plan one provider at a time until one of them yields
 * a complete location. Credentialed providers without a key are recorded
 * as `credential-missing` at their place in the plan. Each provider is
 * tried at most once per request and calls never overlap.
 */
export class FallbackOrchestrator {
  constructor(private readonly clients: UpstreamClients) {}

  async resolveLocation(
    query: GeoQuery,
    resolved: ResolvedCredentials,
    target: FormatSelection
  ): Promise<ResolutionResult> {
    const attempts: AttemptRecord[] = [];

    for (const candidate of planCandidates(resolved)) {
      const id = candidate.providerId;
      const key = isCredentialed(id) ? resolved.keys[id] : undefined;

      // Skipped without a call; nobody can supply a key for it
      if (isCredentialed(id) && !key) {
        attempts.push({ providerId: id, reason: "credential-missing" });
        continue;
      }

      const outcome = await this.clients[id].invoke(query, key);

      if (outcome.ok) {
        const format: OutputFormat =
          target === "native" ? candidate.nativeFormat : target;
        logger.debug(
          `Resolved ${query.ip} via ${id} after ${attempts.length} failed attempt(s)`
        );
        return {
          envelope: buildSuccessEnvelope(outcome.location, format, outcome.rawPayload),
          location: outcome.location,
          attempts,
        };
      }

      logger.debug(
        `Upstream ${id} failed for ${query.ip}: ${outcome.reason}${
          outcome.detail ? ` (${outcome.detail})` : ""
        }`
      );
      attempts.push({
        providerId: id,
        reason: outcome.reason,
        detail: outcome.detail,
      });
    }

    logger.warn(
      `All upstreams exhausted for ${query.ip}: ${
        attempts.map((a) => `${a.providerId}=${a.reason}`).join(", ") || "no candidates"
      }`
    );

    return {
      envelope: buildFailureEnvelope(target === "native" ? "baidu" : target),
      location: null,
      attempts,
    };
  }
}
