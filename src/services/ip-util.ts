/**
 * Utility functions for working with IPv4 addresses
 */
export class IpUtil {
  /**
   * Validate if the given string is a dotted-quad IPv4 address with every
   * octet in 0-255
   */
  static isValidIpv4(ip: string): boolean {
    const pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
    if (!pattern.test(ip)) return false;

    return ip
      .split(".")
      .map(Number)
      .every((num) => num >= 0 && num <= 255);
  }
}
