import axios, { AxiosError, type AxiosInstance } from "axios";
import { NET } from "../config.js";

const httpClient: AxiosInstance = axios.create({
  timeout: NET.HTTP_TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "SslExpiryMonitor/1.0",
    "Content-Type": "application/json"
  }
});

/**
 * POST a JSON body and return the response status.
 *
 * Non-2xx responses reject. No retries: a failed notification waits for the next cycle.
 *
 * @param url - Target URL.
 * @param body - JSON-serialisable payload.
 */
export async function postJson(url: string, body: object): Promise<number> {
  const response = await httpClient.post(url, body);
  return response.status;
}

/**
 * Describe an HTTP failure, including status and body when the server answered.
 */
export function describeHttpError(cause: unknown): string {
  if (cause instanceof AxiosError) {
    const status = cause.response?.status;
    const statusText = cause.response?.statusText;
    const data: unknown = cause.response?.data;
    const body = typeof data === "string" ? data : data === undefined ? "" : JSON.stringify(data);
    const prefix = status ? `status ${status}${statusText ? ` ${statusText}` : ""}: ` : "";
    return `${prefix}${cause.message}${body ? ` - ${body}` : ""}`;
  }
  return cause instanceof Error ? cause.message : String(cause);
}

export { httpClient };
