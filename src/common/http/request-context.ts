import type { Request } from 'express';

export type RequestContext = {
  ip?: string;
  userAgent?: string;
};

export function getClientIp(req: Request): string | undefined {
  const forwarded = req.headers['x-forwarded-for'];

  if (typeof forwarded === 'string') {
    return forwarded.split(',')[0]?.trim() || undefined;
  }

  if (Array.isArray(forwarded)) {
    return forwarded[0];
  }

  return req.ip || req.socket?.remoteAddress || undefined;
}

export function getRequestContext(req: Request): RequestContext {
  const ip = getClientIp(req);
  const userAgent = req.get('user-agent');

  return {
    ...(ip ? { ip } : {}),
    ...(userAgent ? { userAgent } : {}),
  };
}

export function getCookie(
  req: Pick<Request, 'headers'>,
  name: string,
): string | null {
  const entry = req.headers.cookie
    ?.split(';')
    .map((part) => part.trim())
    .find((part) => part.startsWith(`${name}=`));

  if (entry === undefined) {
    return null;
  }

  const value = entry.slice(name.length + 1);

  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed percent-encoding.
    return value;
  }
}
