import axios from "axios";
import type { AxiosInstance } from "axios";
import type { Logger } from "../config/logger";
import { describeError } from "../utils/errors";

export interface GraphClientOptions {
  accessToken: string;
  graphVersion: string;
  logger: Logger;
  timeoutMs?: number;
}

/** Graph API client with request/response logging; media downloads reuse it for the bearer token. */
export function createGraphClient({ accessToken, graphVersion, logger, timeoutMs = 20000 }: GraphClientOptions): AxiosInstance {
  const graph = axios.create({
    baseURL: `https://graph.facebook.com/${graphVersion}`,
    headers: { Authorization: `Bearer ${accessToken}` },
    timeout: timeoutMs,
  });

  graph.interceptors.request.use((config) => {
    logger.debug({
      method: config.method?.toUpperCase(),
      url: (config.baseURL || '') + (config.url || ''),
      dataSize: config.data ? JSON.stringify(config.data).length : 0,
    }, `📡 Graph API Request: ${config.method?.toUpperCase()} ${config.url}`);
    return config;
  });

  graph.interceptors.response.use(
    (response) => {
      logger.debug({
        status: response.status,
        url: response.config.url,
        method: response.config.method?.toUpperCase(),
      }, `📥 Graph API Response: ${response.status} for ${response.config.method?.toUpperCase()} ${response.config.url}`);
      return response;
    },
    (error: unknown) => {
      const url = axios.isAxiosError(error) ? error.config?.url : undefined;
      logger.error({
        url,
        error: describeError(error),
      }, `❌ Graph API Error for ${url}: ${describeError(error)}`);
      return Promise.reject(error);
    }
  );

  return graph;
}
