import type { RequestCookie } from "./schemas.js";

export interface Cookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires?: Date;
  secure: boolean;
  httpOnly: boolean;
  /** Set when the cookie carried no `Domain` attribute; only the exact host matches. */
  hostOnly: boolean;
}

export function serializeCookieHeader(cookies: readonly RequestCookie[]): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
}

function defaultPath(url: URL): string {
  const path = url.pathname;
  if (!path.startsWith("/")) {
    return "/";
  }

  const lastSlash = path.lastIndexOf("/");
  if (lastSlash <= 0) {
    return "/";
  }

  return path.slice(0, lastSlash);
}

export function domainMatches(host: string, domain: string): boolean {
  if (host === domain) {
    return true;
  }

  return host.endsWith(`.${domain}`) && !/^[\d.]+$/.test(host);
}

export function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) {
    return true;
  }

  if (!requestPath.startsWith(cookiePath)) {
    return false;
  }

  return cookiePath.endsWith("/") || requestPath.charAt(cookiePath.length) === "/";
}

/**
 * Parses one `Set-Cookie` header value received from `url`.
 * Returns null when the header is malformed or its `Domain` does not cover the host.
 */
export function parseSetCookie(header: string, url: URL, now: Date = new Date()): Cookie | null {
  const [pair = "", ...attributes] = header.split(";");
  const separatorIndex = pair.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const name = pair.slice(0, separatorIndex).trim();
  const value = pair.slice(separatorIndex + 1).trim();
  if (!name) {
    return null;
  }

  const host = url.hostname.toLowerCase();
  const cookie: Cookie = {
    name,
    value,
    domain: host,
    path: defaultPath(url),
    secure: false,
    httpOnly: false,
    hostOnly: true,
  };

  let maxAgeExpiry: Date | undefined;
  let expiresAttribute: Date | undefined;

  for (const rawAttribute of attributes) {
    const equalsIndex = rawAttribute.indexOf("=");
    const key = (equalsIndex < 0 ? rawAttribute : rawAttribute.slice(0, equalsIndex))
      .trim()
      .toLowerCase();
    const attributeValue = equalsIndex < 0 ? "" : rawAttribute.slice(equalsIndex + 1).trim();

    switch (key) {
      case "domain": {
        const domain = attributeValue.replace(/^\./, "").toLowerCase();
        if (!domain) {
          break;
        }
        if (!domainMatches(host, domain)) {
          return null;
        }
        cookie.domain = domain;
        cookie.hostOnly = false;
        break;
      }
      case "path":
        if (attributeValue.startsWith("/")) {
          cookie.path = attributeValue;
        }
        break;
      case "max-age": {
        if (!/^-?\d+$/.test(attributeValue)) {
          break;
        }
        const seconds = Number.parseInt(attributeValue, 10);
        maxAgeExpiry = seconds <= 0 ? new Date(0) : new Date(now.getTime() + seconds * 1000);
        break;
      }
      case "expires": {
        const parsed = new Date(attributeValue);
        if (!Number.isNaN(parsed.getTime())) {
          expiresAttribute = parsed;
        }
        break;
      }
      case "secure":
        cookie.secure = true;
        break;
      case "httponly":
        cookie.httpOnly = true;
        break;
      default:
        break;
    }
  }

  const expires = maxAgeExpiry ?? expiresAttribute;
  if (expires) {
    cookie.expires = expires;
  }

  return cookie;
}

function cookieKey(cookie: Cookie): string {
  return `${cookie.domain};${cookie.path};${cookie.name}`;
}

export class CookieJar {
  private readonly cookies = new Map<string, Cookie>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /** Stores a cookie from a `Set-Cookie` value; returns false when it was rejected. */
  setCookie(url: URL, header: string): boolean {
    const now = this.clock();
    const cookie = parseSetCookie(header, url, now);
    if (!cookie) {
      return false;
    }

    const key = cookieKey(cookie);
    if (cookie.expires && cookie.expires.getTime() <= now.getTime()) {
      this.cookies.delete(key);
      return true;
    }

    this.cookies.set(key, cookie);
    return true;
  }

  getCookies(url: URL): Cookie[] {
    const now = this.clock().getTime();
    const host = url.hostname.toLowerCase();
    const secureChannel = url.protocol === "https:";
    const matches: Cookie[] = [];

    for (const [key, cookie] of this.cookies) {
      if (cookie.expires && cookie.expires.getTime() <= now) {
        this.cookies.delete(key);
        continue;
      }

      const hostMatch = cookie.hostOnly ? host === cookie.domain : domainMatches(host, cookie.domain);
      if (!hostMatch || !pathMatches(url.pathname || "/", cookie.path)) {
        continue;
      }

      if (cookie.secure && !secureChannel) {
        continue;
      }

      matches.push({ ...cookie });
    }

    // Stable sort keeps insertion order among equal path lengths.
    return matches.sort((a, b) => b.path.length - a.path.length);
  }

  get size(): number {
    return this.cookies.size;
  }
}
