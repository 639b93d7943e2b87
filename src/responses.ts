import { SimResponse } from "./types";

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): SimResponse {
  return {
    status,
    headers: { "content-type": "application/json", ...headers },
    body: JSON.stringify(body)
  };
}

export function textResponse(status: number, body: string): SimResponse {
  return { status, headers: { "content-type": "text/plain; charset=utf-8" }, body };
}

export function emptyResponse(status: number): SimResponse {
  return { status, headers: {}, body: "" };
}

export function unauthorizedResponse(): SimResponse {
  return jsonResponse(401, { detail: "Missing or incorrect API Key" });
}
