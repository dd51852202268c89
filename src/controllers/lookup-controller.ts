import { NextFunction, Request, Response } from "express";
import { GeoServerStatus, LookupResult } from "../models/geo-data";
import { IpUtil } from "../services/ip-util";

export interface LookupBackend {
  lookup(ip: string): Promise<LookupResult>;
  status(): Promise<GeoServerStatus>;
}

/**
 * Subject address of a lookup request: the path segment when given,
 * otherwise the address the request came from
 */
export function subjectIpFor(req: Request): string {
  const fromPath = req.params.ip ?? "";
  if (fromPath !== "") {
    return fromPath;
  }
  return IpUtil.clientIpFor(
    req.get("X-Forwarded-For"),
    req.socket.remoteAddress
  );
}

export function createLookupController(backend: LookupBackend) {
  return {
    // GET /lookup/:ip or /lookup/ for the caller's own address
    async lookup(req: Request, res: Response, next: NextFunction) {
      try {
        const ip = subjectIpFor(req);
        const result = await backend.lookup(ip);

        if (!result.ok) {
          return res.status(500).json({
            error: "Unable to look up ip address",
            ip,
          });
        }

        res.set("X-Reflected-Ip", ip);
        return res.type("application/json").send(result.data);
      } catch (error) {
        return next(error);
      }
    },

    // GET /health
    async health(req: Request, res: Response, next: NextFunction) {
      try {
        const status = await backend.status();
        return res.status(200).json({
          status: "UP",
          database: {
            source: status.source,
            lastModified: status.lastModified,
          },
          cachedEntries: status.cachedEntries,
        });
      } catch (error) {
        return next(error);
      }
    },
  };
}
