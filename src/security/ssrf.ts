import { lookup } from "node:dns/promises";
import net from "node:net";

export class BlockedUrlError extends Error {
  constructor(reason: string, url: URL) {
    super(`refusing to fetch ${url.toString()}: ${reason}`);
    this.name = "BlockedUrlError";
  }
}

export function isBlockedHostname(hostname: string): boolean {
  const h = (hostname || "").trim().replace(/\.$/, "").toLowerCase();
  if (!h) return true;
  if (h === "localhost" || h.endsWith(".localhost")) return true;
  if (h === "local" || h.endsWith(".local")) return true;
  return false;
}

export function isBlockedIp(ip: string): boolean {
  const family = net.isIP(ip);
  if (family === 4) return isBlockedIPv4(ip);
  if (family === 6) return isBlockedIPv6(ip);
  return true;
}

function isBlockedIPv4(ip: string): boolean {
  const parts = ip.split(".").map((p) => Number(p));
  if (parts.length !== 4 || parts.some((n) => Number.isNaN(n) || n < 0 || n > 255)) return true;
  const [a = 0, b = 0] = parts;

  // 0.0.0.0/8, 127.0.0.0/8
  if (a === 0 || a === 127) return true;
  // 10.0.0.0/8
  if (a === 10) return true;
  // 169.254.0.0/16 (link-local)
  if (a === 169 && b === 254) return true;
  // 172.16.0.0/12
  if (a === 172 && b >= 16 && b <= 31) return true;
  // 192.168.0.0/16
  if (a === 192 && b === 168) return true;
  // 100.64.0.0/10 (CGNAT)
  if (a === 100 && b >= 64 && b <= 127) return true;
  // 224.0.0.0/4 (multicast) + 240.0.0.0/4 (reserved)
  if (a >= 224) return true;

  return false;
}

function isBlockedIPv6(ip: string): boolean {
  const norm = ip.toLowerCase();
  // ::, ::1
  if (norm === "::" || norm === "::1") return true;
  // IPv4-mapped (::ffff:a.b.c.d)
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/.exec(norm);
  if (mapped?.[1]) return isBlockedIPv4(mapped[1]);
  // fc00::/7 (unique local)
  if (norm.startsWith("fc") || norm.startsWith("fd")) return true;
  // fe80::/10 (link-local)
  if (norm.startsWith("fe8") || norm.startsWith("fe9") || norm.startsWith("fea") || norm.startsWith("feb")) return true;
  // ff00::/8 (multicast)
  if (norm.startsWith("ff")) return true;
  return false;
}

export async function assertSafeUrl(url: URL): Promise<void> {
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new BlockedUrlError("unsupported protocol", url);
  }
  if (!url.hostname) throw new BlockedUrlError("missing host", url);
  if (url.username || url.password) throw new BlockedUrlError("credentials in url", url);

  // IPv6 literals come back bracketed from URL.hostname
  const host = url.hostname.trim().replace(/^\[(.*)\]$/, "$1");
  if (isBlockedHostname(host)) throw new BlockedUrlError("blocked hostname", url);

  // If hostname is already an IP literal, validate it directly.
  if (net.isIP(host)) {
    if (isBlockedIp(host)) throw new BlockedUrlError("blocked address", url);
    return;
  }

  const addrs = await lookup(host, { all: true, verbatim: true });
  if (!addrs.length) throw new BlockedUrlError("no addresses for host", url);
  for (const a of addrs) {
    if (isBlockedIp(a.address)) throw new BlockedUrlError("blocked address", url);
  }
}
