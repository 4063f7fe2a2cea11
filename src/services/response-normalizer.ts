import { ZodError } from "zod";
import { NormalizedLocation, ProviderId } from "../models/location";
import {
  amapPayloadSchema,
  baiduMapPayloadSchema,
  baiduOpendataPayloadSchema,
  pconlinePayloadSchema,
} from "./payload-schemas";
import { ProvinceTable } from "./province-table";

export type NormalizeResult =
  | { ok: true; location: NormalizedLocation }
  | {
      ok: false;
      reason: "malformed-response" | "incomplete-location";
      detail: string;
    };

/**
 * Location fields as a provider reported them, before completion
 */
interface RawFields {
  countryCode: string;
  province: string;
  city: string;
  district?: string;
  adcode?: string;
  cityCode?: number;
  longitude?: string;
  latitude?: string;
  rectangle?: string;
}

type ParseResult =
  | { success: true; fields: RawFields }
  | { success: false; detail: string };

const CITY_SUFFIXES = ["自治州", "地区", "盟", "市"];
const ADCODE_PATTERN = /^\d{6}$/;

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Split "惠州市惠城区" into ["惠州市", "惠城区"] at the first city-level
 * suffix. Text without one is treated as a bare city name.
 */
export function splitCityAndDistrict(text: string): [string, string] {
  let end = -1;
  for (const suffix of CITY_SUFFIXES) {
    const index = text.indexOf(suffix);
    if (index > 0 && (end === -1 || index + suffix.length < end)) {
      end = index + suffix.length;
    }
  }
  return end === -1 ? [text, ""] : [text.slice(0, end), text.slice(end)];
}

/**
 * Turns provider payloads into NormalizedLocation values.
 *
 * Province names always come out complete, whichever provider sent them,
 * and a payload without both province and city is rejected as
 * `incomplete-location` so the caller can fall through to the next
 * provider.
 */
export class ResponseNormalizer {
  constructor(private readonly provinces: ProvinceTable) {}

  normalize(rawPayload: unknown, sourceProviderId: ProviderId): NormalizeResult {
    const parsed = this.parse(rawPayload, sourceProviderId);
    if (!parsed.success) {
      return { ok: false, reason: "malformed-response", detail: parsed.detail };
    }

    const fields = parsed.fields;
    const province = this.provinces.complete(fields.province);
    const city = this.provinces.completeCity(fields.city);

    if (!province || !city) {
      return {
        ok: false,
        reason: "incomplete-location",
        detail: `province="${province}" city="${city}"`,
      };
    }

    const location: NormalizedLocation = {
      countryCode: fields.countryCode,
      province,
      city,
      sourceProviderId,
    };

    if (fields.district) location.district = fields.district;
    if (fields.adcode) location.adcode = fields.adcode;
    if (fields.cityCode !== undefined) location.cityCode = fields.cityCode;
    if (fields.longitude && fields.latitude) {
      location.longitude = fields.longitude;
      location.latitude = fields.latitude;
    }
    if (fields.rectangle) location.rectangle = fields.rectangle;

    return { ok: true, location };
  }

  private parse(rawPayload: unknown, providerId: ProviderId): ParseResult {
    switch (providerId) {
      case "baidu-map":
        return this.parseBaiduMap(rawPayload);
      case "amap":
        return this.parseAmap(rawPayload);
      case "baidu-opendata":
        return this.parseBaiduOpendata(rawPayload);
      case "pconline":
        return this.parsePconline(rawPayload);
    }
  }

  private parseBaiduMap(rawPayload: unknown): ParseResult {
    const result = baiduMapPayloadSchema.safeParse(rawPayload);
    if (!result.success) {
      return { success: false, detail: describeZodError(result.error) };
    }
    if (result.data.status !== 0) {
      return { success: false, detail: `status ${result.data.status}` };
    }

    const { address, content } = result.data;
    const detail = content.address_detail;

    return {
      success: true,
      fields: {
        // "CN|广东省|惠州市|None|CHINANET|0|0"
        countryCode: address.split("|")[0] || "CN",
        province: detail.province,
        city: detail.city,
        district: detail.district,
        adcode: detail.adcode,
        cityCode: detail.city_code,
        longitude: content.point?.x,
        latitude: content.point?.y,
      },
    };
  }

  private parseAmap(rawPayload: unknown): ParseResult {
    const result = amapPayloadSchema.safeParse(rawPayload);
    if (!result.success) {
      return { success: false, detail: describeZodError(result.error) };
    }

    const data = result.data;
    return {
      success: true,
      fields: {
        countryCode: "CN",
        province: data.province,
        city: data.city,
        adcode: data.adcode,
        rectangle: data.rectangle,
      },
    };
  }

  private parseBaiduOpendata(rawPayload: unknown): ParseResult {
    const result = baiduOpendataPayloadSchema.safeParse(rawPayload);
    if (!result.success) {
      return { success: false, detail: describeZodError(result.error) };
    }

    // "广东省惠州市 电信": drop the carrier, then split off the province
    const location = result.data.data[0].location
      .trim()
      .replace(/\s+\S+$/, "")
      .replace(/\s+/g, "");

    const match = this.provinces.matchPrefix(location);
    if (!match) {
      // Outside the table, e.g. "美国": a lone region is its own city
      const parts = location.split(/[省市区]/).filter(Boolean);
      const province = parts[0] || "";
      return {
        success: true,
        fields: { countryCode: "", province, city: parts[1] || province },
      };
    }

    const { entry, rest } = match;
    if (entry.kind === "municipality") {
      return {
        success: true,
        fields: {
          countryCode: "CN",
          province: entry.fullName,
          city: entry.fullName,
          district: rest,
        },
      };
    }

    const [city, district] = splitCityAndDistrict(rest);
    return {
      success: true,
      fields: { countryCode: "CN", province: entry.fullName, city, district },
    };
  }

  private parsePconline(rawPayload: unknown): ParseResult {
    const result = pconlinePayloadSchema.safeParse(rawPayload);
    if (!result.success) {
      return { success: false, detail: describeZodError(result.error) };
    }

    const data = result.data;
    if (data.err) {
      return { success: false, detail: `err ${data.err}` };
    }

    const province = data.pro.trim();
    const adcode = [data.regionCode, data.cityCode, data.proCode]
      .map((code) => code.trim())
      .find((code) => ADCODE_PATTERN.test(code));

    return {
      success: true,
      fields: {
        countryCode: this.provinces.lookup(province) ? "CN" : "",
        province,
        city: data.city.trim(),
        district: data.region.trim(),
        adcode,
      },
    };
  }
}
