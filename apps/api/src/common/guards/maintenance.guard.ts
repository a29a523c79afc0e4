import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import * as ipaddr from 'ipaddr.js';
import type { Env } from '../../config/env';

function ipInCidr(ip: string, cidr: string) {
  // cidr: "10.0.0.0/8"
  try {
    const [addr, bits] = ipaddr.parseCIDR(cidr);
    const parsed = ipaddr.process(ip);
    if (parsed instanceof ipaddr.IPv4 && addr instanceof ipaddr.IPv4) return parsed.match([addr, bits]);
    if (parsed instanceof ipaddr.IPv6 && addr instanceof ipaddr.IPv6) return parsed.match([addr, bits]);
    return false;
  } catch {
    return false;
  }
}

function sameIp(a: string, b: string) {
  try {
    return ipaddr.process(a).toString() === ipaddr.process(b).toString();
  } catch {
    return a === b;
  }
}

export function isIpAllowed(reqIp: string, allowlist: string[]): boolean {
  if (!allowlist.length) return true; // no allowlist, no IP check
  return allowlist.some(rule => (rule.includes('/') ? ipInCidr(reqIp, rule) : sameIp(reqIp, rule)));
}

function clientIp(req: Request): string {
  const fwd = req.headers['x-forwarded-for'];
  const first = (Array.isArray(fwd) ? fwd[0] : fwd)?.split(',')[0];
  return (first ?? req.socket.remoteAddress ?? '').trim();
}

@Injectable()
export class MaintenanceGuard implements CanActivate {
  constructor(private cfg: ConfigService<Env, true>) {}

  canActivate(ctx: ExecutionContext): boolean {
    if (!this.cfg.get('MAINTENANCE_API_ENABLED', { infer: true })) {
      throw new ForbiddenException('Maintenance API disabled');
    }

    const req = ctx.switchToHttp().getRequest<Request>();
    const token = req.headers['x-admin-token'];
    const expected = this.cfg.get('MAINTENANCE_ADMIN_TOKEN', { infer: true });
    if (!expected || token !== expected) {
      throw new ForbiddenException('Invalid admin token');
    }

    if (!isIpAllowed(clientIp(req), this.cfg.get('MAINTENANCE_IP_ALLOWLIST', { infer: true }))) {
      throw new ForbiddenException('IP not allowed');
    }

    return true;
  }
}
