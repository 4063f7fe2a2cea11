import { IpUtil } from "../../src/services/ip-util";

describe("IpUtil", () => {
  describe("isValidIpv4", () => {
    test.each(["114.247.50.2", "0.0.0.0", "255.255.255.255", "8.8.8.8"])(
      "should accept %s",
      (ip) => {
        expect(IpUtil.isValidIpv4(ip)).toBe(true);
      }
    );

    test.each([
      "256.0.0.0",
      "192.168.1",
      "192.168.1.1.1",
      "1.2.3.1000",
      "not-an-ip",
      "",
      " 1.2.3.4",
      "1.2.3.4;DROP",
      "2001:db8::1",
      "::ffff:192.168.1.1",
    ])("should reject %p", (ip) => {
      expect(IpUtil.isValidIpv4(ip)).toBe(false);
    });
  });
});
