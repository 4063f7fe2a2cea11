import { ResponseNormalizer, splitCityAndDistrict } from "../../src/services/response-normalizer";
import {
  amapOk,
  amapUnknownIp,
  baiduMapOk,
  baiduMapTruncatedProvince,
  baiduOpendata,
  pconlineNoCity,
  pconlineOk,
  pconlineTruncatedProvince,
} from "../fixtures/payloads";
import { loadProvinces } from "../utils/test-app";

describe("ResponseNormalizer", () => {
  let normalizer: ResponseNormalizer;

  beforeAll(async () => {
    normalizer = new ResponseNormalizer(await loadProvinces());
  });

  describe("Baidu Map payloads", () => {
    it("should keep coordinates and codes", () => {
      expect(normalizer.normalize(baiduMapOk, "baidu-map")).toEqual({
        ok: true,
        location: {
          countryCode: "CN",
          province: "广东省",
          city: "惠州市",
          adcode: "441300",
          cityCode: 301,
          longitude: "114.41065",
          latitude: "23.11353",
          sourceProviderId: "baidu-map",
        },
      });
    });

    it("should complete a truncated province", () => {
      const result = normalizer.normalize(baiduMapTruncatedProvince, "baidu-map");
      expect(result.ok && result.location.province).toBe("广西壮族自治区");
      expect(result.ok && result.location.longitude).toBeUndefined();
    });

    it("should reject a body without content", () => {
      const result = normalizer.normalize({ status: 0 }, "baidu-map");
      expect(result).toMatchObject({ ok: false, reason: "malformed-response" });
    });
  });

  describe("AMap payloads", () => {
    it("should keep adcode and rectangle", () => {
      expect(normalizer.normalize(amapOk, "amap")).toEqual({
        ok: true,
        location: {
          countryCode: "CN",
          province: "广东省",
          city: "惠州市",
          adcode: "441300",
          rectangle: "114.2,22.9;114.6,23.3",
          sourceProviderId: "amap",
        },
      });
    });

    it("should treat empty arrays as missing fields", () => {
      expect(normalizer.normalize(amapUnknownIp, "amap")).toEqual({
        ok: false,
        reason: "incomplete-location",
        detail: 'province="" city=""',
      });
    });

    it("should classify an empty city as incomplete", () => {
      const result = normalizer.normalize({ ...amapOk, city: "" }, "amap");
      expect(result).toEqual({
        ok: false,
        reason: "incomplete-location",
        detail: 'province="广东省" city=""',
      });
    });

    it("should reject a non-object body", () => {
      const result = normalizer.normalize("<html>", "amap");
      expect(result).toMatchObject({ ok: false, reason: "malformed-response" });
    });
  });

  describe("Baidu open data payloads", () => {
    it("should split province and city and drop the carrier", () => {
      expect(normalizer.normalize(baiduOpendata("广东省惠州市 电信"), "baidu-opendata")).toEqual({
        ok: true,
        location: {
          countryCode: "CN",
          province: "广东省",
          city: "惠州市",
          sourceProviderId: "baidu-opendata",
        },
      });
    });

    it("should treat a municipality as its own city", () => {
      expect(normalizer.normalize(baiduOpendata("北京市海淀区 联通"), "baidu-opendata")).toEqual({
        ok: true,
        location: {
          countryCode: "CN",
          province: "北京市",
          city: "北京市",
          district: "海淀区",
          sourceProviderId: "baidu-opendata",
        },
      });
    });

    it("should complete a short province prefix", () => {
      const result = normalizer.normalize(baiduOpendata("广西桂林市 联通"), "baidu-opendata");
      expect(result.ok && result.location.province).toBe("广西壮族自治区");
      expect(result.ok && result.location.city).toBe("桂林市");
    });

    it("should answer foreign locations with the region as its own city", () => {
      expect(normalizer.normalize(baiduOpendata("美国 "), "baidu-opendata")).toEqual({
        ok: true,
        location: {
          countryCode: "",
          province: "美国",
          city: "美国",
          sourceProviderId: "baidu-opendata",
        },
      });
    });

    it("should classify an empty location as incomplete", () => {
      const result = normalizer.normalize(baiduOpendata(""), "baidu-opendata");
      expect(result).toMatchObject({ ok: false, reason: "incomplete-location" });
    });

    it("should reject an empty data list", () => {
      const result = normalizer.normalize({ status: "0", data: [] }, "baidu-opendata");
      expect(result).toMatchObject({ ok: false, reason: "malformed-response" });
    });
  });

  describe("pconline payloads", () => {
    it("should take the most specific adcode", () => {
      expect(normalizer.normalize(pconlineOk, "pconline")).toEqual({
        ok: true,
        location: {
          countryCode: "CN",
          province: "广东省",
          city: "惠州市",
          adcode: "441300",
          sourceProviderId: "pconline",
        },
      });
    });

    it("should complete a truncated province", () => {
      const result = normalizer.normalize(pconlineTruncatedProvince, "pconline");
      expect(result.ok && result.location.province).toBe("广西壮族自治区");
      expect(result.ok && result.location.adcode).toBe("450300");
    });

    it("should classify an empty city as incomplete", () => {
      expect(normalizer.normalize(pconlineNoCity, "pconline")).toEqual({
        ok: false,
        reason: "incomplete-location",
        detail: 'province="广东省" city=""',
      });
    });

    it("should complete bare municipality names", () => {
      const result = normalizer.normalize(
        { ...pconlineOk, pro: "北京", city: "北京", proCode: "110000", cityCode: "110000" },
        "pconline"
      );
      expect(result.ok && result.location.province).toBe("北京市");
      expect(result.ok && result.location.city).toBe("北京市");
    });
  });
});

describe("splitCityAndDistrict", () => {
  it.each([
    ["惠州市", ["惠州市", ""]],
    ["惠州市惠城区", ["惠州市", "惠城区"]],
    ["恩施土家族苗族自治州恩施市", ["恩施土家族苗族自治州", "恩施市"]],
    ["大兴安岭地区", ["大兴安岭地区", ""]],
    ["锡林郭勒盟", ["锡林郭勒盟", ""]],
    ["", ["", ""]],
  ])("should split %p", (text, expected) => {
    expect(splitCityAndDistrict(text)).toEqual(expected);
  });
});
