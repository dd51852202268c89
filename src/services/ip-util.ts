import { isIPv6 } from "net";

/**
 * Utility functions for working with IP addresses
 */
export class IpUtil {
  private static readonly IPV4_REGEX =
    /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

  private static readonly IPV4_MAPPED_PREFIX = "0:0:0:0:0:ffff";

  /**
   * Validate if the given string is a valid IPv4 address
   */
  static isValidIpv4(ip: string): boolean {
    if (!this.IPV4_REGEX.test(ip)) return false;

    return ip
      .split(".")
      .map(Number)
      .every((num) => num >= 0 && num <= 255);
  }

  /**
   * Validate if the given string is a valid IPv6 address in any RFC 4291
   * text form, including embedded IPv4
   */
  static isValidIpv6(ip: string): boolean {
    return isIPv6(ip);
  }

  /**
   * Determine if an IP address is IPv4 or IPv6
   */
  static getIpVersion(ip: string): 4 | 6 | null {
    if (this.isValidIpv4(ip)) return 4;
    if (this.isValidIpv6(ip)) return 6;
    return null;
  }

  static isValidIp(ip: string): boolean {
    return this.getIpVersion(ip) !== null;
  }

  /**
   * Canonical form used as the cache key and handed to the decoder.
   *
   * IPv4 loses leading zeros, IPv6 is lower-cased and expanded to eight
   * groups, and IPv4-mapped IPv6 collapses to the plain IPv4 address.
   * Returns null for anything that is not an IP address.
   *
   * Example: "2001:DB8::1" -> "2001:db8:0:0:0:0:0:1"
   */
  static normalize(ip: string): string | null {
    let candidate = ip.trim().toLowerCase();

    const zoneIndex = candidate.indexOf("%");
    if (zoneIndex !== -1) {
      candidate = candidate.substring(0, zoneIndex);
    }

    if (this.isValidIpv4(candidate)) {
      return this.normalizeIpv4(candidate);
    }

    if (!this.isValidIpv6(candidate)) {
      return null;
    }

    return this.expandIpv6(candidate);
  }

  /**
   * Address of the client a request originated from. A forwarded-for list
   * names the original client first.
   */
  static clientIpFor(
    forwardedFor: string | undefined,
    remoteAddress: string | undefined
  ): string {
    const clientIp = forwardedFor?.trim() || remoteAddress || "";
    return clientIp.split(",")[0].trim();
  }

  private static normalizeIpv4(ip: string): string {
    return ip
      .split(".")
      .map((octet) => parseInt(octet, 10).toString())
      .join(".");
  }

  private static expandIpv6(ip: string): string | null {
    let head = ip;
    let ipv4Tail: string | null = null;

    // Embedded IPv4 occupies the last two groups
    if (ip.includes(".")) {
      const cut = ip.lastIndexOf(":");
      ipv4Tail = this.normalizeIpv4(ip.substring(cut + 1));
      head = ip.substring(0, cut + 1);
      if (!head.endsWith("::")) {
        head = head.slice(0, -1);
      }
    }

    const groupCount = ipv4Tail === null ? 8 : 6;
    const compression = head.indexOf("::");

    let groups: string[];
    if (compression === -1) {
      groups = head.split(":");
    } else {
      const left = head.substring(0, compression);
      const right = head.substring(compression + 2);
      const leftGroups = left ? left.split(":") : [];
      const rightGroups = right ? right.split(":") : [];
      const missing = groupCount - leftGroups.length - rightGroups.length;
      if (missing < 0) return null;

      groups = [
        ...leftGroups,
        ...Array<string>(missing).fill("0"),
        ...rightGroups,
      ];
    }

    if (groups.length !== groupCount) return null;

    const expanded = groups
      .map((group) => parseInt(group, 16).toString(16))
      .join(":");

    if (ipv4Tail === null) {
      return expanded;
    }

    if (expanded === this.IPV4_MAPPED_PREFIX) {
      return ipv4Tail;
    }

    return `${expanded}:${ipv4Tail}`;
  }
}
