import express from "express";
import { AppConfig } from "./config";
import { createLocationController } from "./controllers/location-controller";
import { createLocationRoutes } from "./routes/location-routes";
import { FetchJson } from "./services/http-fetcher";
import { LocationService } from "./services/location-service";
import { logger } from "./services/logger";
import { ProvinceTable } from "./services/province-table";
import { Rng } from "./services/rng";

export interface AppDeps {
  config: AppConfig;
  provinces: ProvinceTable;
  fetchJson: FetchJson;
  rng: Rng;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const service = new LocationService(deps);

  // Middleware
  app.use(express.json());

  // Routes
  app.use(createLocationRoutes(createLocationController(service)));

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({
      status: "healthy",
      version: deps.config.version,
      timestamp: new Date().toISOString(),
    });
  });

  app.use((req, res) => {
    res.status(404).json({ error: "Not Found" });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      // Express only treats four-argument middleware as an error handler
      next: express.NextFunction
    ) => {
      logger.error(err.stack || err.message);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}
