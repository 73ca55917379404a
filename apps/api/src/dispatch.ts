import type { AppEnv } from "./env";
import { errorMessage } from "./errors";

const SUCCESS_STATUSES = new Set([200, 201, 202]);
const MAX_RESPONSE_BODY = 2000;

export type DispatchTarget = {
  endpoint?: string;
  token?: string;
};

export type DispatchResult =
  | { outcome: "success"; statusCode: number; responseBody: string }
  | { outcome: "failure"; statusCode?: number; responseBody?: string; error?: string }
  | { outcome: "config_error"; error: string };

export function clientApiTarget(env: AppEnv): DispatchTarget {
  return { endpoint: env.clientApi.endpoint, token: env.clientApi.key };
}

export function whatsappTarget(env: AppEnv): DispatchTarget {
  const { baseUrl, apiVersion, phoneNumberId, accessToken } = env.whatsapp;
  return {
    endpoint: phoneNumberId
      ? `${baseUrl}/${apiVersion}/${encodeURIComponent(phoneNumberId)}/messages`
      : undefined,
    token: accessToken
  };
}

export function isConfigured(target: DispatchTarget) {
  return Boolean(target.endpoint && target.token && isHttpUrl(target.endpoint));
}

function isHttpUrl(value: string) {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function truncate(value: string, max = MAX_RESPONSE_BODY) {
  return value.length > max ? value.slice(0, max) : value;
}

export async function dispatchPayload(
  target: DispatchTarget,
  payload: unknown,
  options: { timeoutMs: number }
): Promise<DispatchResult> {
  if (!target.endpoint || !target.token) {
    return { outcome: "config_error", error: "Missing endpoint or access token" };
  }

  if (!isHttpUrl(target.endpoint)) {
    return { outcome: "config_error", error: "Endpoint is not an absolute http(s) URL" };
  }

  try {
    const response = await fetch(target.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${target.token}`
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(options.timeoutMs)
    });

    const responseBody = truncate(await response.text());

    if (!SUCCESS_STATUSES.has(response.status)) {
      return { outcome: "failure", statusCode: response.status, responseBody };
    }

    return { outcome: "success", statusCode: response.status, responseBody };
  } catch (error) {
    return { outcome: "failure", error: errorMessage(error) };
  }
}
