import { z } from "zod";

/**
 * AMap answers `[]` instead of an empty string when it has no value
 */
const amapText = z
  .union([z.string(), z.array(z.unknown())])
  .optional()
  .transform((value) => (typeof value === "string" ? value : ""));

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

/** Baidu sends status as a number, some gateways relay it as a string */
const numericStatus = z.union([z.number(), z.string()]).pipe(z.coerce.number());

export const baiduMapStatusSchema = z.object({
  status: numericStatus,
  message: z.string().optional(),
});

export const baiduMapPayloadSchema = z.object({
  status: numericStatus,
  address: text,
  content: z.object({
    address: text,
    address_detail: z.object({
      province: text,
      city: text,
      district: text,
      adcode: text,
      street: text,
      street_number: text,
      city_code: z.coerce.number().optional(),
    }),
    point: z
      .object({
        x: z.coerce.string(),
        y: z.coerce.string(),
      })
      .optional(),
  }),
});

export const amapStatusSchema = z.object({
  status: z.coerce.string(),
  info: z.string().optional(),
  infocode: z.coerce.string().optional(),
});

export const amapPayloadSchema = z.object({
  status: z.literal("1"),
  province: amapText,
  city: amapText,
  adcode: amapText,
  rectangle: amapText,
});

export const baiduOpendataStatusSchema = z.object({
  status: z.coerce.string(),
  data: z.array(z.unknown()).optional(),
});

export const baiduOpendataPayloadSchema = z.object({
  status: z.literal("0"),
  data: z
    .array(
      z.object({
        location: text,
      })
    )
    .min(1),
});

export const pconlineStatusSchema = z.object({
  err: text,
});

export const pconlinePayloadSchema = z.object({
  err: text,
  pro: text,
  proCode: text,
  city: text,
  cityCode: text,
  region: text,
  regionCode: text,
});

export type BaiduMapPayload = z.infer<typeof baiduMapPayloadSchema>;
export type AmapPayload = z.infer<typeof amapPayloadSchema>;
export type BaiduOpendataPayload = z.infer<typeof baiduOpendataPayloadSchema>;
export type PconlinePayload = z.infer<typeof pconlinePayloadSchema>;
