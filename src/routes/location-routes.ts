import { Router } from "express";
import { LocationController } from "../controllers/location-controller";

export function createLocationRoutes(controller: LocationController): Router {
  const router = Router();

  router.get("/location/ip", controller.locationIp);
  router.get("/v3/ip", controller.v3Ip);

  return router;
}
