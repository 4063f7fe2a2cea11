/**
 * Provider payloads shaped like the real services' answers
 */
export const baiduMapOk = {
  address: "CN|广东省|惠州市|None|CHINANET|0|0",
  content: {
    address: "广东省惠州市",
    address_detail: {
      adcode: "441300",
      city: "惠州市",
      city_code: 301,
      district: "",
      province: "广东省",
      street: "",
      street_number: "",
    },
    point: { x: "114.41065", y: "23.11353" },
  },
  status: 0,
};

export const baiduMapTruncatedProvince = {
  address: "CN|广西|南宁市|None|UNICOM|0|0",
  content: {
    address: "广西南宁市",
    address_detail: {
      adcode: "450100",
      city: "南宁市",
      city_code: 261,
      district: "",
      province: "广西",
      street: "",
      street_number: "",
    },
  },
  status: 0,
};

export const baiduMapDisabled = { status: 240, message: "APP 服务被禁用" };

export const baiduMapInternalError = { status: 1, message: "Internal Service Error" };

export const amapOk = {
  status: "1",
  info: "OK",
  infocode: "10000",
  province: "广东省",
  city: "惠州市",
  adcode: "441300",
  rectangle: "114.2,22.9;114.6,23.3",
};

export const amapUnknownIp = {
  status: "1",
  info: "OK",
  infocode: "10000",
  province: [],
  city: [],
  adcode: [],
  rectangle: [],
};

export const amapInvalidKey = {
  status: "0",
  info: "INVALID_USER_KEY",
  infocode: "10001",
};

export const amapInvalidParams = {
  status: "0",
  info: "INVALID_PARAMS",
  infocode: "20000",
};

export function baiduOpendata(location: string) {
  return {
    status: "0",
    t: "",
    set_cache_time: "",
    data: [{ location, titlecont: "IP地址查询", origip: "114.247.50.2" }],
  };
}

export const pconlineOk = {
  ip: "114.247.50.2",
  pro: "广东省",
  proCode: "440000",
  city: "惠州市",
  cityCode: "441300",
  region: "",
  regionCode: "0",
  addr: "广东省惠州市 电信",
  regionNames: "",
  err: "",
};

export const pconlineNoCity = {
  ...pconlineOk,
  city: "",
  cityCode: "0",
  addr: "广东省 电信",
};

export const pconlineTruncatedProvince = {
  ...pconlineOk,
  pro: "广西",
  proCode: "450000",
  city: "桂林市",
  cityCode: "450300",
  addr: "广西桂林市 联通",
};
