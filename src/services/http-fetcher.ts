import axios from "axios";

export interface FetchOptions {
  timeoutMs: number;
  /** Body encoding; pconline still answers in GBK */
  encoding?: "utf-8" | "gbk";
}

/**
 * GET a URL and parse the body as JSON.
 *
 * Rejects with UpstreamTransportError when no usable response arrived and
 * with UpstreamParseError when the body is not JSON.
 */
export type FetchJson = (
  url: string,
  params: Record<string, string>,
  options: FetchOptions
) => Promise<unknown>;

export class UpstreamTransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UpstreamTransportError";
  }
}

export class UpstreamParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UpstreamParseError";
  }
}

export function decodeBody(bytes: Uint8Array, encoding: "utf-8" | "gbk"): string {
  return new TextDecoder(encoding).decode(bytes);
}

export function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const snippet = text.trim().slice(0, 80);
    throw new UpstreamParseError(`Response is not JSON: ${snippet}`);
  }
}

/**
 * Axios-backed fetcher used in production
 */
export const axiosFetchJson: FetchJson = async (url, params, options) => {
  let bytes: Uint8Array;

  try {
    const response = await axios.get<ArrayBuffer>(url, {
      params,
      timeout: options.timeoutMs,
      responseType: "arraybuffer",
      validateStatus: (status) => status >= 200 && status < 300,
    });
    bytes = new Uint8Array(response.data);
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const status = error.response ? ` (HTTP ${error.response.status})` : "";
      throw new UpstreamTransportError(`${error.message}${status}`);
    }
    throw error;
  }

  return parseJsonBody(decodeBody(bytes, options.encoding || "utf-8"));
};
