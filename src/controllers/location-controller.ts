import { Request, Response } from "express";
import { CredentialKeys, FormatSelection, GeoQuery } from "../models/location";
import { IpUtil } from "../services/ip-util";
import { LocationService } from "../services/location-service";
import { logger } from "../services/logger";

export interface LocationController {
  locationIp(req: Request, res: Response): Promise<Response>;
  v3Ip(req: Request, res: Response): Promise<Response>;
}

function queryString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function createLocationController(
  service: LocationService
): LocationController {
  async function respond(
    req: Request,
    res: Response,
    target: FormatSelection,
    credentials: CredentialKeys
  ): Promise<Response> {
    try {
      const ip = queryString(req.query.ip);

      if (!ip) {
        return res.status(400).json({
          error: "Missing required query parameter: ip",
        });
      }

      if (!IpUtil.isValidIpv4(ip)) {
        return res.status(400).json({
          error: "Invalid IP address format",
        });
      }

      logger.info(`Looking up location for IP: ${ip} (${req.path})`);

      const query: GeoQuery = {
        ip,
        coordinateSystem: queryString(req.query.coor),
        credentials,
      };
      const result = await service.lookup(query, target);

      return res.status(result.envelope.httpStatus).json(result.envelope.body);
    } catch (error) {
      logger.error("Error processing location request:", error);
      return res
        .status(500)
        .json({ error: "Failed to process location request" });
    }
  }

  return {
    // GET /location/ip?ip=x.x.x.x&coor=bd09ll&ak=...&key=...
    locationIp(req, res) {
      const credentials: CredentialKeys = {};
      const ak = queryString(req.query.ak);
      const key = queryString(req.query.key);
      if (ak) credentials["baidu-map"] = ak;
      if (key) credentials.amap = key;
      return respond(req, res, "native", credentials);
    },

    // GET /v3/ip?ip=x.x.x.x&key=...
    v3Ip(req, res) {
      const key = queryString(req.query.key);
      return respond(req, res, "amap", key ? { amap: key } : {});
    },
  };
}
