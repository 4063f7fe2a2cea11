import { resolveCredentials } from "../../src/services/credential-resolver";
import { Rng } from "../../src/services/rng";
import { fixedRng } from "../utils/test-app";

const throwingRng: Rng = {
  nextInt: () => {
    throw new Error("random selection must not run");
  },
};

describe("resolveCredentials", () => {
  const ip = "114.247.50.2";

  it("should put Baidu Map first when the caller sends an ak", () => {
    const resolved = resolveCredentials(
      { ip, credentials: { "baidu-map": "caller-ak" } },
      { "baidu-map": "default-ak", amap: "default-key" },
      throwingRng
    );

    expect(resolved).toEqual({
      primary: "baidu-map",
      keys: { "baidu-map": "caller-ak", amap: "default-key" },
    });
  });

  it("should put AMap first when the caller only sends a key", () => {
    const resolved = resolveCredentials(
      { ip, credentials: { amap: "caller-key" } },
      {},
      throwingRng
    );

    expect(resolved).toEqual({
      primary: "amap",
      keys: { amap: "caller-key" },
    });
  });

  it("should prefer Baidu Map when the caller sends both", () => {
    const resolved = resolveCredentials(
      { ip, credentials: { "baidu-map": "caller-ak", amap: "caller-key" } },
      {},
      throwingRng
    );

    expect(resolved.primary).toBe("baidu-map");
    expect(resolved.keys).toEqual({ "baidu-map": "caller-ak", amap: "caller-key" });
  });

  it("should pick at random among all providers when defaults exist", () => {
    const rng = { nextInt: jest.fn().mockReturnValue(1) };

    const resolved = resolveCredentials(
      { ip },
      { "baidu-map": "default-ak", amap: "default-key" },
      rng
    );

    expect(rng.nextInt).toHaveBeenCalledWith(4);
    expect(resolved).toEqual({
      primary: "amap",
      keys: { "baidu-map": "default-ak", amap: "default-key" },
    });
  });

  it("should only draw from keyless providers without defaults", () => {
    const rng = { nextInt: jest.fn().mockReturnValue(1) };

    const resolved = resolveCredentials({ ip }, {}, rng);

    expect(rng.nextInt).toHaveBeenCalledWith(2);
    expect(resolved).toEqual({
      primary: "pconline",
      keys: {},
    });
  });

  it("should skip a credentialed provider that has no default", () => {
    const resolved = resolveCredentials({ ip }, { amap: "default-key" }, fixedRng(0));

    expect(resolved.primary).toBe("amap");
  });

  it("should treat empty caller keys as absent", () => {
    const resolved = resolveCredentials(
      { ip, credentials: { "baidu-map": "" } },
      {},
      fixedRng(0)
    );

    expect(resolved).toEqual({
      primary: "baidu-opendata",
      keys: {},
    });
  });
});
