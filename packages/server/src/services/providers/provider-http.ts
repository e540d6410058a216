import type { ProviderId } from "@gpubroker/shared";
import {
  AuthenticationError,
  ProviderRejectedError,
  QuotaExceededError,
  TransientProviderError,
  type ProviderError,
} from "../../errors.js";

const QUOTA_PATTERN =
  /quota|limit exceeded|exceeds? your .*limit|insufficient[_ ]capacity|insufficient funds|limit reached/i;

/** Map a non-OK provider response onto the shared error taxonomy. */
export function errorFromResponse(
  provider: ProviderId,
  status: number,
  body: string,
  action: string,
): ProviderError {
  const message = `${provider} ${action} failed: ${status} ${body}`.trim();

  if (status === 401 || status === 403) {
    return new AuthenticationError(provider, message);
  }
  if (status === 402 || QUOTA_PATTERN.test(body)) {
    return new QuotaExceededError(provider, message);
  }
  if (status === 408 || status === 504) {
    return new TransientProviderError(provider, "timeout", message);
  }
  if (status === 429 || status >= 500) {
    return new TransientProviderError(provider, "unavailable", message);
  }
  return new ProviderRejectedError(provider, message);
}

export async function assertOk(
  provider: ProviderId,
  res: Response,
  action: string,
): Promise<void> {
  if (res.ok) return;
  const body = await res.text().catch(() => "");
  throw errorFromResponse(provider, res.status, body, action);
}

/** Collapse vendor names to a comparable key: "RTX 4090" and "nvidia_rtx_4090" → "RTX4090". */
export function normalizeGpuName(name: string): string {
  return name.toUpperCase().replace(/^NVIDIA[\s_-]*/, "").replace(/[\s_-]+/g, "");
}

export function gpuMatches(requested: string, offered: string): boolean {
  const want = normalizeGpuName(requested);
  return want.length > 0 && normalizeGpuName(offered).startsWith(want);
}
