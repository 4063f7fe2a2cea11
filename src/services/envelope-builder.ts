import {
  AmapBody,
  BaiduSuccessBody,
  NormalizedLocation,
  OutputFormat,
  ResponseEnvelope,
} from "../models/location";
import { baiduMapPayloadSchema } from "./payload-schemas";

export const BAIDU_UNAVAILABLE_MESSAGE = "所有上游IP查询接口均不可用，请稍后再试";
export const AMAP_UNAVAILABLE_INFO = "所有上游接口均不可用";
export const AMAP_UNAVAILABLE_INFOCODE = "10003";

function toBaiduBody(location: NormalizedLocation): BaiduSuccessBody {
  const district = location.district || "";
  // Municipalities: "北京市" rather than "北京市北京市"
  const region =
    location.province === location.city
      ? location.city
      : location.province + location.city;

  const body: BaiduSuccessBody = {
    address: `${location.countryCode}|${location.province}|${location.city}||None||||`,
    content: {
      address: region + district,
      address_detail: {
        adcode: location.adcode || "",
        city: location.city,
        city_code: location.cityCode ?? 0,
        district,
        province: location.province,
        street: "",
        street_number: "",
      },
    },
    status: 0,
  };

  if (location.longitude && location.latitude) {
    body.content.point = { x: location.longitude, y: location.latitude };
  }

  return body;
}

/**
 * Baidu Map's own body with only province and city swapped for their
 * completed forms. The `address` string keeps its carrier slot.
 */
function mirrorBaiduMapBody(
  rawPayload: unknown,
  location: NormalizedLocation
): BaiduSuccessBody | null {
  const result = baiduMapPayloadSchema.safeParse(rawPayload);
  if (!result.success) return null;

  const { address, content } = result.data;
  const detail = content.address_detail;

  // "CN|广西|南宁市|None|UNICOM|0|0"
  const slots = address.split("|");
  if (slots.length < 3) return null;
  slots[1] = location.province;
  slots[2] = location.city;

  const body: BaiduSuccessBody = {
    address: slots.join("|"),
    content: {
      address: content.address,
      address_detail: {
        adcode: detail.adcode,
        city: location.city,
        city_code: detail.city_code ?? 0,
        district: detail.district,
        province: location.province,
        street: detail.street,
        street_number: detail.street_number,
      },
    },
    status: 0,
  };

  if (content.point) {
    body.content.point = content.point;
  }

  return body;
}

function toAmapBody(location: NormalizedLocation): AmapBody {
  return {
    status: "1",
    info: `OK (${location.sourceProviderId})`,
    infocode: "10000",
    province: location.province,
    city: location.city,
    adcode: location.adcode || "",
    rectangle: location.rectangle || "",
  };
}

/**
 * Response for a resolved location in the given format. A Baidu-format
 * answer from Baidu Map itself is served from its raw payload.
 */
export function buildSuccessEnvelope(
  location: NormalizedLocation,
  format: OutputFormat,
  rawPayload?: unknown
): ResponseEnvelope {
  if (format === "amap") {
    return { format, ok: true, httpStatus: 200, body: toAmapBody(location) };
  }

  const mirrored =
    location.sourceProviderId === "baidu-map"
      ? mirrorBaiduMapBody(rawPayload, location)
      : null;

  return {
    format,
    ok: true,
    httpStatus: 200,
    body: mirrored ?? toBaiduBody(location),
  };
}

/**
 * Response once every upstream has failed. The AMap shape keeps HTTP 200
 * and signals failure through `status`/`infocode`.
 */
export function buildFailureEnvelope(format: OutputFormat): ResponseEnvelope {
  if (format === "amap") {
    return {
      format,
      ok: false,
      httpStatus: 200,
      body: {
        status: "0",
        info: AMAP_UNAVAILABLE_INFO,
        infocode: AMAP_UNAVAILABLE_INFOCODE,
        province: "",
        city: "",
        adcode: "",
        rectangle: "",
      },
    };
  }

  return {
    format,
    ok: false,
    httpStatus: 503,
    body: { status: 503, message: BAIDU_UNAVAILABLE_MESSAGE },
  };
}
