// Response helpers shared by the Lambda handlers.
import type { RequestContext } from "@src/util/logger";

export type HandlerContext = RequestContext;

export interface HandlerResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

const HEADERS = {
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
};

export function jsonResponse(statusCode: number, payload: unknown): HandlerResponse {
  return { statusCode, headers: { ...HEADERS }, body: JSON.stringify(payload) };
}

export function errorResponse(
  statusCode: number,
  error: string,
  details?: string[]
): HandlerResponse {
  return jsonResponse(statusCode, details ? { error, details } : { error });
}
