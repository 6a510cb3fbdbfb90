import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { AppError } from "../infra/app-error.js";
import { isRecord } from "../infra/json.js";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  trimValues: true,
});

const builder = new XMLBuilder({ format: false });

export interface OrderPlacement {
  payload: Record<string, unknown>;
  order: Record<string, unknown>;
}

export const INVALID_XML_ERROR_CODE = "020";
export const INTERNAL_ERROR_CODE = "999";

/** Parses the placement document; repeated tags come back as arrays. */
export function parseOrderPlacementXml(xml: string): OrderPlacement {
  if (xml.trim().length === 0 || XMLValidator.validate(xml) !== true) {
    throw new AppError(400, "invalid_xml", "Invalid XML received");
  }
  const parsed: unknown = parser.parse(xml);
  if (!isRecord(parsed)) {
    throw new AppError(400, "invalid_xml", "Invalid XML received");
  }
  const rootKeys = Object.keys(parsed).filter((key) => !key.startsWith("?"));
  const payload: Record<string, unknown> = {};
  for (const key of rootKeys) {
    payload[key] = parsed[key];
  }
  const root = rootKeys.length === 1 && rootKeys[0] !== undefined ? payload[rootKeys[0]] : undefined;
  return { payload, order: isRecord(root) ? root : payload };
}

export function extractXmlDocument(body: unknown): string | null {
  if (typeof body === "string") {
    return body;
  }
  if (isRecord(body) && typeof body.xml === "string") {
    return body.xml;
  }
  return null;
}

export function buildOrderSuccessXml(orderId: string): string {
  return `${XML_DECLARATION}${builder.build({ order: { code: "SUCCESS", orderId } })}`;
}

export function buildOrderErrorXml(errorCode: string, errorMsg: string): string {
  return `${XML_DECLARATION}${builder.build({ order: { code: "ERROR", errorCode, errorMsg } })}`;
}
