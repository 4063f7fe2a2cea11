import { AppConfig } from "../config";
import { FormatSelection, GeoQuery } from "../models/location";
import { resolveCredentials } from "./credential-resolver";
import { FallbackOrchestrator, ResolutionResult } from "./fallback-orchestrator";
import { FetchJson } from "./http-fetcher";
import { ProvinceTable } from "./province-table";
import { ResponseNormalizer } from "./response-normalizer";
import { Rng } from "./rng";
import { createUpstreamClients } from "./upstream";

export interface LocationServiceDeps {
  config: AppConfig;
  provinces: ProvinceTable;
  fetchJson: FetchJson;
  rng: Rng;
}

/**
 * Entry point of the lookup core: credentials, then fallback across
 * providers, then the response envelope
 */
export class LocationService {
  private readonly orchestrator: FallbackOrchestrator;

  constructor(private readonly deps: LocationServiceDeps) {
    const clients = createUpstreamClients({
      fetchJson: deps.fetchJson,
      normalizer: new ResponseNormalizer(deps.provinces),
      timeoutMs: deps.config.upstreamTimeoutMs,
    });
    this.orchestrator = new FallbackOrchestrator(clients);
  }

  async lookup(query: GeoQuery, target: FormatSelection): Promise<ResolutionResult> {
    const resolved = resolveCredentials(
      query,
      this.deps.config.defaultKeys,
      this.deps.rng
    );
    return this.orchestrator.resolveLocation(query, resolved, target);
  }
}
