import type { RequestHandler } from "express";

import { AuthorizationError } from "../shared/errors.js";

export type RequestGuardOptions = {
  bannedIps: string[];
  /** Regular expressions matched against the User-Agent header. */
  bannedUserAgents: string[];
};

function normalizeIp(ip: string): string {
  // Express reports IPv4 clients on dual-stack sockets as ::ffff:a.b.c.d
  return ip.startsWith("::ffff:") ? ip.slice(7) : ip;
}

/**
 * Rejects banned client IPs and user agents with 403 before any routing.
 */
export function requestGuard(options: RequestGuardOptions): RequestHandler {
  const ips = new Set(options.bannedIps.map(normalizeIp));
  const agents = options.bannedUserAgents.map((pattern) => new RegExp(pattern, "i"));

  return (req, _res, next) => {
    const ip = req.ip ? normalizeIp(req.ip) : "";
    if (ip && ips.has(ip)) {return next(new AuthorizationError("You are banned"));}

    const userAgent = req.get("user-agent") ?? "";
    if (agents.some((re) => re.test(userAgent))) {
      return next(new AuthorizationError("You are banned"));
    }
    return next();
  };
}
